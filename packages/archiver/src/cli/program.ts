import { resolve } from 'path';
import { Command, CommanderError } from 'commander';
import type { RunSummary } from '@dvr-archiver/common-types';
import {
  CatalogCorruptError,
  DomainError,
  InvalidInputError,
  LedgerCorruptError,
  RecordingNotFoundError,
  createRunSummary,
} from '@dvr-archiver/common-types';
import type { ArchiverSettings, SettingsInput } from '../infrastructure/config/archiverConfig.js';
import {
  defaultSettingsFilePath,
  loadSettingsFile,
  resolveSettings,
  settingsInputSchema,
} from '../infrastructure/config/archiverConfig.js';
import type { ArchiverContainer } from '../infrastructure/di/setupContainer.js';
import type { RecordingListItem } from '../domain/usecases/ListRecordings.usecase.js';
import type { RetrievePlan } from '../domain/usecases/RetrieveRecording.usecase.js';
import { setDefaultLogLevel } from '../shared/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_INPUT = 2;
export const EXIT_CORRUPT_STORE = 3;

export interface CliDeps {
  env: Record<string, string | undefined>;
  homeDir?: string;
  createContainer: (settings: ArchiverSettings) => Promise<ArchiverContainer>;
  /** Where summaries and listings are printed */
  write?: (line: string) => void;
  /** Aborted on SIGINT/SIGTERM; stops a running transcode */
  signal?: AbortSignal;
}

type GlobalOptions = {
  config?: string;
  devices?: string;
  catalog?: string;
  ledger?: string;
  recordingsDir?: string;
  identityMode?: string;
  logLevel?: string;
};

/**
 * エラーの種類から終了コードを決める
 *
 * 入力エラー 2、ストア破損 3、その他 1
 */
export function exitCodeForError(err: unknown): number {
  if (err instanceof InvalidInputError) {
    return EXIT_INVALID_INPUT;
  }
  if (err instanceof CatalogCorruptError || err instanceof LedgerCorruptError) {
    return EXIT_CORRUPT_STORE;
  }
  return EXIT_FAILURE;
}

/**
 * "=== Sync Summary ===" 形式の集計
 */
export function formatSummary(summary: RunSummary): string[] {
  const title = summary.operation.charAt(0).toUpperCase() + summary.operation.slice(1);
  const lines = [
    `=== ${title} Summary ===`,
    `Succeeded: ${summary.succeeded.length}`,
    `Skipped: ${summary.skipped.length}`,
    `Failed: ${summary.failed.length}`,
  ];
  for (const failure of summary.failed) {
    lines.push(`  - ${failure.subject} [${failure.code}]: ${failure.message}`);
  }
  return lines;
}

export function formatListItem(item: RecordingListItem): string[] {
  const flags = [item.downloadStatus, ...(item.stale ? ['stale'] : [])].join(', ');
  const lines = [`${item.device}${item.recordingId} [${flags}] ${item.filename ?? '(unknown category)'}`];
  if (item.title) {
    lines.push(`    title: ${item.title}`);
  }
  if (item.description) {
    lines.push(`    ${item.description}`);
  }
  if (item.localPath) {
    lines.push(`    path: ${item.localPath}`);
  }
  return lines;
}

function flagsFrom(options: GlobalOptions): SettingsInput {
  const parsed = settingsInputSchema.safeParse({
    devices: options.devices
      ?.split(',')
      .map((d) => d.trim())
      .filter((d) => d.length > 0),
    catalogPath: options.catalog,
    ledgerPath: options.ledger,
    recordingsDir: options.recordingsDir,
    identityMode: options.identityMode,
    logLevel: options.logLevel,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidInputError(`Invalid option ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * dvr-archiver コマンドを実行し、終了コードを返す
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const write = deps.write ?? ((line: string) => console.log(line));
  let exitCode = EXIT_OK;

  const printSummary = (summary: RunSummary) => {
    for (const line of formatSummary(summary)) {
      write(line);
    }
    if (summary.failed.length > 0) {
      exitCode = EXIT_FAILURE;
    }
  };

  const withContainer = async (
    command: Command,
    fn: (container: ArchiverContainer) => Promise<void>,
  ): Promise<void> => {
    const options = command.optsWithGlobals<GlobalOptions>();
    const file = options.config
      ? await loadSettingsFile(resolve(options.config), true)
      : await loadSettingsFile(defaultSettingsFilePath(deps.homeDir), false);
    const settings = resolveSettings({ flags: flagsFrom(options), env: deps.env, file, homeDir: deps.homeDir });
    setDefaultLogLevel(settings.logLevel);

    const container = await deps.createContainer(settings);
    try {
      await fn(container);
    } finally {
      await container.close();
    }
  };

  const program = new Command();
  program
    .name('dvr-archiver')
    .description('Sync, download and archive recordings from networked DVR devices')
    .version('0.1.0')
    .option('-c, --config <path>', 'JSON config file (default: ~/.dvrarchiverrc)')
    .option('-d, --devices <list>', 'Comma-separated device addresses')
    .option('--catalog <path>', 'Catalog file')
    .option('--ledger <path>', 'Upload ledger file')
    .option('-r, --recordings-dir <dir>', 'Directory downloads are written to')
    .option('--identity-mode <mode>', 'Upload identity: blake3 | size-mtime')
    .option('--log-level <level>', 'debug | info | warn | error')
    .exitOverride()
    .configureOutput({ writeOut: (str) => write(str.trimEnd()) });

  program
    .command('sync')
    .description('Create or update the catalog from every known device')
    .action(async (_options: object, command: Command) => {
      await withContainer(command, async (container) => {
        const report = await container.synchronizeCatalog.execute({ devices: [...container.settings.devices] });
        printSummary(report.summary);
      });
    });

  program
    .command('list')
    .description('Print the catalog')
    .option('--device <address>', 'Only this device')
    .option('--no-stale', 'Hide recordings no longer on the device')
    .option('--json', 'Print JSON')
    .action(async (options: { device?: string; stale: boolean; json?: boolean }, command: Command) => {
      await withContainer(command, async (container) => {
        const items = await container.listRecordings.execute({
          device: options.device,
          includeStale: options.stale,
        });
        if (options.json) {
          write(JSON.stringify(items, null, 2));
          return;
        }
        for (const item of items) {
          for (const line of formatListItem(item)) {
            write(line);
          }
        }
        write(`${items.length} recordings`);
      });
    });

  /**
   * 取得の失敗（入力エラー・ストア破損以外）は集計に入れて終了コード 1 にする
   */
  const collectFailure = (summary: RunSummary, subject: string, err: unknown) => {
    if (err instanceof DomainError && exitCodeForError(err) === EXIT_FAILURE) {
      summary.failed.push({ subject, code: err.code, message: err.message });
      return;
    }
    throw err;
  };

  const describePlan = (plan: RetrievePlan): string => {
    switch (plan.action) {
      case 'reuse':
        return `[dry run] Would skip existing download ${plan.path}`;
      case 'overwrite':
        return `[dry run] Would overwrite existing download ${plan.path}`;
      default:
        return `[dry run] Would download ${plan.title} to ${plan.path}`;
    }
  };

  program
    .command('download <recording-id>')
    .description('Download one recording by identifier')
    .option('--device <address>', 'Device the recording lives on')
    .option('--overwrite', 'Replace an existing file')
    .option('--dry-run', 'Only report where the recording would be written')
    .action(
      async (
        recordingId: string,
        options: { device?: string; overwrite?: boolean; dryRun?: boolean },
        command: Command,
      ) => {
        await withContainer(command, async (container) => {
          const entry = await container.resolveEpisode.findById(recordingId, options.device);
          if (!entry) {
            throw new RecordingNotFoundError(`Recording ${recordingId} is not in the catalog; run sync first`);
          }
          const request = {
            ref: entry.getRef(),
            destinationDir: container.settings.recordingsDir,
            overwrite: options.overwrite ?? false,
          };
          if (options.dryRun) {
            write(describePlan(await container.retrieveRecording.plan(request)));
            return;
          }

          const summary = createRunSummary('download');
          try {
            const file = await container.retrieveRecording.execute({ ...request, signal: deps.signal });
            (file.reused ? summary.skipped : summary.succeeded).push(file.path);
          } catch (err) {
            collectFailure(summary, recordingId, err);
          }
          printSummary(summary);
        });
      },
    );

  program
    .command('download-latest <show>')
    .description('Download the newest episode of a show that is not downloaded yet')
    .option('--overwrite', 'Replace an existing file')
    .option('--strict', 'Fail when several shows match equally well')
    .option('--include-downloaded', 'Consider episodes that were already downloaded')
    .option('--dry-run', 'Only report which episode would be downloaded')
    .action(
      async (
        show: string,
        options: { overwrite?: boolean; strict?: boolean; includeDownloaded?: boolean; dryRun?: boolean },
        command: Command,
      ) => {
        await withContainer(command, async (container) => {
          const summary = createRunSummary('download');
          try {
            const result = await container.downloadLatest.execute({
              query: show,
              destinationDir: container.settings.recordingsDir,
              overwrite: options.overwrite ?? false,
              resolve: { strict: options.strict ?? false, excludeDownloaded: !options.includeDownloaded },
              dryRun: options.dryRun ?? false,
              signal: deps.signal,
            });
            if (result.status === 'planned') {
              write(describePlan(result.plan));
              return;
            }
            if (result.status === 'skipped') {
              summary.skipped.push(`${show} (${result.reason})`);
            } else {
              (result.file.reused ? summary.skipped : summary.succeeded).push(result.file.path);
            }
          } catch (err) {
            collectFailure(summary, show, err);
          }
          printSummary(summary);
        });
      },
    );

  program
    .command('details <recording-id>')
    .description('Print the metadata the device reports for one recording')
    .option('--device <address>', 'Device the recording lives on')
    .action(async (recordingId: string, options: { device?: string }, command: Command) => {
      await withContainer(command, async (container) => {
        let device = options.device;
        if (!device) {
          const entry = await container.resolveEpisode.findById(recordingId);
          if (!entry) {
            throw new RecordingNotFoundError(
              `Recording ${recordingId} is not in the catalog; run sync first or pass --device`,
            );
          }
          device = entry.getRef().device;
        }
        const recording = await container.deviceClient.getRecording(device, recordingId);
        write(JSON.stringify(recording, null, 2));
      });
    });

  program
    .command('upload [dir]')
    .description('Upload every video file that has not been uploaded yet')
    .option('--dry-run', 'Only report what would be uploaded')
    .action(async (dir: string | undefined, options: { dryRun?: boolean }, command: Command) => {
      await withContainer(command, async (container) => {
        const useCase = container.uploadRecordings({ dryRun: options.dryRun ?? false });
        const report = await useCase.uploadDirectory(resolve(dir ?? container.settings.recordingsDir));
        printSummary(report.summary);
      });
    });

  program
    .command('upload-newest [dir]')
    .description('Upload only the most recently modified video file not uploaded yet')
    .option('--dry-run', 'Only report what would be uploaded')
    .action(async (dir: string | undefined, options: { dryRun?: boolean }, command: Command) => {
      await withContainer(command, async (container) => {
        const useCase = container.uploadRecordings({ dryRun: options.dryRun ?? false });
        const report = await useCase.uploadNewest(resolve(dir ?? container.settings.recordingsDir));
        printSummary(report.summary);
      });
    });

  program
    .command('validate [dir]')
    .description('Check downloaded files for truncation or corruption')
    .action(async (dir: string | undefined, _options: object, command: Command) => {
      await withContainer(command, async (container) => {
        const report = await container.validateDownloads.execute(resolve(dir ?? container.settings.recordingsDir));
        for (const result of report.invalid) {
          write(`INVALID ${result.fileName}: ${result.validation?.reason ?? ''}`);
        }
        for (const result of report.errors) {
          write(`ERROR ${result.fileName}: ${result.error ?? ''}`);
        }
        printSummary(report.summary);
      });
    });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_INVALID_INPUT;
    }
    const message = err instanceof Error ? err.message : String(err);
    const code = err instanceof DomainError ? ` [${err.code}]` : '';
    console.error(`❌ [Archiver]${code} ${message}`);
    return exitCodeForError(err);
  }

  return exitCode;
}
