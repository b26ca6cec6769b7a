/**
 * @file Command-Line Arguments
 *
 * Turns argv into the CLI settings layer. Values stay raw strings here;
 * SettingsService validates and clamps them alongside env and file values.
 * Both `--flag=value` and `--flag value` are accepted.
 *
 * @module cli/args
 */

import type { RawSettings, SettingsKey } from '../config/settings.js';

export interface ParsedArgs {
    help: boolean;
    configPath: string | null;
    settings: RawSettings;
    warnings: string[];
}

/** Flags that take a value, and the setting each one feeds. */
const VALUE_FLAGS: ReadonlyMap<string, SettingsKey | 'config'> = new Map<string, SettingsKey | 'config'>([
    ['--limit', 'limit'],
    ['--sort', 'sortField'],
    ['--thread-limit', 'threadLimitPerProcess'],
    ['--max-scan', 'maxScanCount'],
    ['--cpu-mode', 'cpuMode'],
    ['--proc-root', 'procRoot'],
    ['--config', 'config']
]);

/** Flags that take no value, and what each one sets. */
const SWITCH_FLAGS: ReadonlyMap<string, RawSettings> = new Map<string, RawSettings>([
    ['--verbose', { verbose: true }],
    ['--zombie', { includeZombies: true }],
    ['--threads', { includeThreads: true }],
    ['--kb', { memoryUnit: 'KB' }],
    ['--mb', { memoryUnit: 'MB' }],
    ['--json', { output: 'json' }]
]);

/**
 * Parse arguments (without the node and script entries).
 */
export function args_parse(argv: readonly string[]): ParsedArgs {
    const parsed: ParsedArgs = { help: false, configPath: null, settings: {}, warnings: [] };

    for (let i: number = 0; i < argv.length; i++) {
        const arg: string = argv[i];
        const eq: number = arg.indexOf('=');
        const flag: string = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
        const inline: string | null = arg.startsWith('--') && eq !== -1 ? arg.slice(eq + 1) : null;

        if (flag === '-h' || flag === '--help') {
            parsed.help = true;
            continue;
        }

        if (flag === '--watch') {
            parsed.settings.watch = true;
            if (inline !== null) {
                parsed.settings.watchIntervalSeconds = inline;
            } else if (i + 1 < argv.length && /^\d+$/.test(argv[i + 1])) {
                parsed.settings.watchIntervalSeconds = argv[++i];
            }
            continue;
        }

        const switched: RawSettings | undefined = SWITCH_FLAGS.get(flag);
        if (switched) {
            if (inline !== null) parsed.warnings.push(`Option ${flag} does not take a value; ignoring '${inline}'.`);
            Object.assign(parsed.settings, switched);
            continue;
        }

        const target: SettingsKey | 'config' | undefined = VALUE_FLAGS.get(flag);
        if (target) {
            let value: string | null = inline;
            if (value === null && i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
                value = argv[++i];
            }
            if (value === null || value === '') {
                parsed.warnings.push(`Option ${flag} requires a value.`);
            } else if (target === 'config') {
                parsed.configPath = value;
            } else {
                parsed.settings[target] = value;
            }
            continue;
        }

        if (arg.startsWith('-')) {
            parsed.warnings.push(`Unknown option '${arg}' ignored. Use --help for usage.`);
        } else {
            parsed.warnings.push(`Unexpected argument '${arg}' ignored.`);
        }
    }

    return parsed;
}
