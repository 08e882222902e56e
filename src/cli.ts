#!/usr/bin/env tsx
import { Command } from 'commander';
import { loadConfig } from './config';
import { Pipeline } from './pipeline';
import { logger, Logger } from './modules/observability';
import { ShutdownHandler } from './utils/shutdown_handler';
import { errorMessage, isFatal, ConfigurationError } from './utils/errors';

type Overrides = Record<string, unknown>;

interface ScanFlags {
    dict: string;
    suffixes?: string;
    comboLength?: string;
    maxComboLength?: string;
    workers?: string;
    timeout?: string;
    minContent?: string;
    resume: boolean;
    config?: string;
    out?: string;
}

interface OutputFlags {
    config?: string;
    out?: string;
}

const splitList = (value: string | undefined): string[] | undefined =>
    value === undefined ? undefined : value.split(',').map(s => s.trim()).filter(Boolean);

const scanOverrides = (flags: ScanFlags): Overrides => ({
    suffixes: splitList(flags.suffixes),
    combination: {
        start_length: flags.comboLength,
        max_length: flags.maxComboLength
    },
    probe: {
        workers: flags.workers,
        timeout_ms: flags.timeout
    },
    classifier: {
        min_content_length: flags.minContent
    },
    // commander defaults --no-resume to true; only an explicit flag should override the file
    resume: flags.resume === false ? false : undefined,
    output: {
        dir: flags.out
    }
});

const fail = (error: unknown, log: Logger) => {
    if (error instanceof ConfigurationError) {
        log.error(error.message, { issues: error.issues });
    } else if (isFatal(error)) {
        log.error(error.message, { code: error.code, context: error.context });
    } else {
        log.error(`Fatal Error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
};

const program = new Command();

program
    .name('domain-prober')
    .description('Enumerate host names, probe them over HTTP and keep the ones serving real content')
    .version('1.0.0');

program
    .command('scan')
    .description('Probe candidates from a word list and then from character combinations; resumes by default')
    .requiredOption('-d, --dict <path>', 'Word list, one base name per line')
    .option('-s, --suffixes <list>', 'Comma-separated suffixes, e.g. com,net,org')
    .option('-l, --combo-length <n>', 'Length the combination phase starts at')
    .option('--max-combo-length <n>', 'Stop the combination phase after this length')
    .option('-w, --workers <n>', 'Concurrent probes')
    .option('-t, --timeout <ms>', 'Per-probe timeout in milliseconds')
    .option('--min-content <chars>', 'Bodies shorter than this are treated as placeholders')
    .option('--no-resume', 'Start from the first candidate instead of after the outcome log tail')
    .option('-c, --config <path>', 'YAML file merged over the defaults')
    .option('-o, --out <dir>', 'Output directory for the outcome log, discovery record and report')
    .action(async (flags: ScanFlags) => {
        const controller = new AbortController();
        const dispose = ShutdownHandler.install(controller, logger);
        try {
            const config = loadConfig({ configPath: flags.config, overrides: scanOverrides(flags) });
            const report = await Pipeline.scan({ dictPath: flags.dict, config, signal: controller.signal });
            console.log(report.metrics);
            if (report.interrupted) process.exitCode = 130;
        } catch (e) {
            fail(e, logger);
        } finally {
            dispose();
        }
    });

program
    .command('report')
    .description('Rewrite the HTML listing from the discovery record')
    .option('-c, --config <path>', 'YAML file merged over the defaults')
    .option('-o, --out <dir>', 'Output directory')
    .action(async (flags: OutputFlags) => {
        try {
            const config = loadConfig({ configPath: flags.config, overrides: { output: { dir: flags.out } } });
            await Pipeline.report(config);
        } catch (e) {
            fail(e, logger);
        }
    });

program
    .command('import-html')
    .description('Merge the links of an older HTML listing into the discovery record')
    .argument('<file>', 'HTML file to read links from')
    .option('-c, --config <path>', 'YAML file merged over the defaults')
    .option('-o, --out <dir>', 'Output directory')
    .action(async (file: string, flags: OutputFlags) => {
        try {
            const config = loadConfig({ configPath: flags.config, overrides: { output: { dir: flags.out } } });
            const result = await Pipeline.importHtml(file, config);
            console.log(result);
        } catch (e) {
            fail(e, logger);
        }
    });

program.parseAsync(process.argv).catch(e => fail(e, logger));
