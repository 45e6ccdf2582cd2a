// src/cli/program.ts

import type { FetchFn, ILogFacility, IProgressReporter } from '../@types/index.ts';
import { Command } from 'commander';
import { loadSettings } from '../config/settings.ts';
import { downloadManuscript } from '../core/manuscript/index.ts';
import { formatError, getLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';
import { CliProgressReporter, LogProgressReporter } from '../utils/progress/progressReporters.ts';

export interface ICliDependencies {
    fetchFn?: FetchFn;
    /** Receives log lines and error output. Defaults to `console`. */
    console?: ILogFacility;
    exit?: (code: number) => void;
    env?: NodeJS.ProcessEnv;
}

interface IDownloadCommandOptions {
    output?: string;
    range?: string;
    config?: string;
    verbose?: boolean;
    log?: boolean;
}

export function createProgram(dependencies: ICliDependencies = {}): Command {
    const out = dependencies.console ?? console;
    const exit = dependencies.exit ?? ((code: number) => process.exit(code));

    const program = new Command();
    program
        .name('folio-harvest')
        .description('Manuscript page downloader for IIIF manifests and deep-zoom tile servers')
        .version('1.0.0');

    program
        .command('download')
        .description('Download a manuscript from a IIIF manifest URL or a legacy manuscript id')
        .argument('<input>', 'Manuscript id (e.g. add_ms_19352) or IIIF manifest URL')
        .option('-o, --output <dir>', 'Directory to save downloads')
        .option('-r, --range <range>', 'Page range to download (e.g. 1-10)')
        .option('-c, --config <file>', 'Settings file (YAML)')
        .option('-l, --log', 'Write log lines instead of a progress bar')
        .option('-v, --verbose', 'Enable debug logging (printed with --log; otherwise only error causes are expanded)')
        .showHelpAfterError()
        .action(async (input: string, options: IDownloadCommandOptions) => {
            const verbose = options.verbose ?? false;
            const isLogging = options.log ?? false;
            const logger = getLogger('folio-harvest', isLogging ? out : NoopLogFacility, verbose);
            const progress: IProgressReporter = isLogging
                ? new LogProgressReporter(logger)
                : new CliProgressReporter(verbose);

            try {
                const settings = loadSettings({
                    configPath: options.config,
                    env: dependencies.env,
                    overrides: { basedir: options.output },
                });
                const summary = await downloadManuscript({
                    input,
                    range: options.range,
                    settings,
                    logger,
                    verbose,
                    progress,
                    fetchFn: dependencies.fetchFn,
                });
                out.log(
                    `Finished ${summary.total} page(s) in ${summary.targetDir}: ${summary.saved} downloaded, ` +
                        `${summary.skipped} skipped, ${summary.degraded} incomplete, ${summary.noImage} without image, ` +
                        `${summary.failed} failed`,
                );
                exit(0);
            } catch (error) {
                out.error(`Error: ${formatError(error, verbose)}`);
                exit(1);
            }
        });

    return program;
}
