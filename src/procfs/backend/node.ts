/**
 * @file Node Filesystem Backend
 *
 * Implements ProcfsBackend against the real filesystem via `fs/promises`.
 *
 * @module procfs/backend
 */

import fs from 'fs/promises';
import type { NodeKind, ProcfsBackend } from '../types.js';

/**
 * Filesystem-backed ProcfsBackend. Every failure collapses to `null`.
 */
export class NodeFsBackend implements ProcfsBackend {
    async text_read(path: string): Promise<string | null> {
        try {
            return await fs.readFile(path, 'utf8');
        } catch {
            return null;
        }
    }

    async dir_list(path: string): Promise<string[] | null> {
        try {
            return await fs.readdir(path);
        } catch {
            return null;
        }
    }

    async path_realpath(path: string): Promise<string | null> {
        try {
            return await fs.realpath(path);
        } catch {
            return null;
        }
    }

    async node_kind(path: string): Promise<NodeKind | null> {
        try {
            const stat = await fs.stat(path);
            if (stat.isDirectory()) return 'dir';
            if (stat.isFile()) return 'file';
            return null;
        } catch {
            return null;
        }
    }
}
