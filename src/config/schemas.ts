/**
 * @file Config File Schema
 *
 * Zod runtime schema for the optional YAML config file. The schema checks
 * shapes only; range clamping and defaults belong to SettingsService, so a
 * file value goes through exactly the same checks as a flag or env value.
 *
 * Keys are snake_case, matching the rest of the project's YAML.
 *
 * @module config/schemas
 */

import { z } from 'zod';

const IntSchema = z.number().int();

export const ConfigFileSchema = z.object({
    limit:        IntSchema.optional(),
    sort:         z.string().optional(),
    watch:        z.boolean().optional(),
    interval:     IntSchema.optional(),
    zombies:      z.boolean().optional(),
    threads:      z.boolean().optional(),
    thread_limit: IntSchema.optional(),
    max_scan:     IntSchema.optional(),
    memory_unit:  z.string().optional(),
    cpu_mode:     z.string().optional(),
    proc_root:    z.string().min(1).optional(),
    output:       z.string().optional(),
    verbose:      z.boolean().optional()
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

