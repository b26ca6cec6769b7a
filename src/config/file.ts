/**
 * @file Config File Loader
 *
 * Reads the optional YAML config file and maps its snake_case keys onto
 * settings keys. Every problem (missing file, bad YAML, unknown key, wrong
 * type) becomes a warning; the offending key is dropped and the rest of
 * the file still applies.
 *
 * @module config/file
 */

import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { ConfigFileSchema, type ConfigFile } from './schemas.js';
import type { RawSettings, SettingsKey } from './settings.js';
import { error_message } from '../core/errors.js';

export interface ConfigFileLoad {
    settings: RawSettings;
    warnings: string[];
}

const FILE_KEYS: Readonly<Record<keyof ConfigFile, SettingsKey>> = Object.freeze({
    limit: 'limit',
    sort: 'sortField',
    watch: 'watch',
    interval: 'watchIntervalSeconds',
    zombies: 'includeZombies',
    threads: 'includeThreads',
    thread_limit: 'threadLimitPerProcess',
    max_scan: 'maxScanCount',
    memory_unit: 'memoryUnit',
    cpu_mode: 'cpuMode',
    proc_root: 'procRoot',
    output: 'output',
    verbose: 'verbose'
});

const FILE_KEY_MAP: ReadonlyMap<string, SettingsKey> = new Map(Object.entries(FILE_KEYS));

function record_is(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML content. Offending keys are removed one round at a
 * time until the remainder passes.
 */
export function configDocument_validate(document: unknown, label: string = 'config file'): ConfigFileLoad {
    const warnings: string[] = [];
    if (document === undefined || document === null) {
        return { settings: {}, warnings };
    }
    if (!record_is(document)) {
        warnings.push(`Ignoring ${label}: expected a mapping at the top level.`);
        return { settings: {}, warnings };
    }

    const remaining: Record<string, unknown> = { ...document };
    let parsed: ReturnType<typeof ConfigFileSchema.safeParse> = ConfigFileSchema.safeParse(remaining);
    while (!parsed.success) {
        let dropped: number = 0;
        for (const issue of parsed.error.issues) {
            if (issue.code === 'unrecognized_keys') {
                for (const key of issue.keys) {
                    warnings.push(`Ignoring unknown key '${key}' in ${label}.`);
                    if (key in remaining) {
                        delete remaining[key];
                        dropped++;
                    }
                }
                continue;
            }
            const head: string | number | undefined = issue.path[0];
            warnings.push(`Ignoring '${issue.path.join('.')}' in ${label}: ${issue.message}.`);
            if (head !== undefined && String(head) in remaining) {
                delete remaining[String(head)];
                dropped++;
            }
        }
        if (dropped === 0) return { settings: {}, warnings };
        parsed = ConfigFileSchema.safeParse(remaining);
    }

    const settings: RawSettings = {};
    for (const [fileKey, value] of Object.entries(parsed.data)) {
        const settingsKey: SettingsKey | undefined = FILE_KEY_MAP.get(fileKey);
        if (settingsKey !== undefined && value !== undefined) settings[settingsKey] = value;
    }
    return { settings, warnings };
}

/**
 * Parse YAML text and validate it.
 */
export function configText_parse(text: string, label: string = 'config file'): ConfigFileLoad {
    let document: unknown;
    try {
        document = yaml.load(text);
    } catch (e: unknown) {
        return { settings: {}, warnings: [`Ignoring ${label}: ${error_message(e)}`] };
    }
    return configDocument_validate(document, label);
}

/**
 * Load the config file at `path`. A missing file is only a warning when the
 * path was asked for explicitly.
 */
export async function configFile_load(path: string, explicit: boolean = true): Promise<ConfigFileLoad> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (e: unknown) {
        if (!explicit) return { settings: {}, warnings: [] };
        return { settings: {}, warnings: [`Cannot read config file '${path}': ${error_message(e)}`] };
    }
    return configText_parse(text, `config file '${path}'`);
}
