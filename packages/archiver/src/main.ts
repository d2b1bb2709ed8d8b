#!/usr/bin/env tsx
import dotenv from 'dotenv';
import { runCli } from './cli/program.js';
import { setupContainer } from './infrastructure/di/setupContainer.js';

dotenv.config();

async function main(): Promise<void> {
  const controller = new AbortController();

  // Graceful shutdown: 実行中の ffmpeg を止め、一時ファイルを削除してから終了
  const shutdown = (signal: string) => {
    if (controller.signal.aborted) {
      console.error(`\n🛑 [Archiver] Received ${signal} again, exiting immediately`);
      process.exit(1);
    }
    console.log(`\n🛑 [Archiver] Received ${signal}, stopping...`);
    controller.abort();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.exitCode = await runCli(process.argv, {
    env: process.env,
    createContainer: (settings) => setupContainer(settings),
    signal: controller.signal,
  });
}

main().catch((err) => {
  console.error('❌ [Archiver] Fatal error:', err);
  process.exit(1);
});
