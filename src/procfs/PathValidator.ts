/**
 * @file Procfs Path Validator
 *
 * Gate in front of every pseudo-file read. A path passes only if it sits
 * under the procfs root both as written and after symbolic links are
 * resolved, and has one of the closed set of process/thread record shapes:
 *
 *   <root>/<pid>                     (directory)
 *   <root>/<pid>/{stat,status,cmdline,task}
 *   <root>/<pid>/task/<tid>          (directory)
 *   <root>/<pid>/task/<tid>/stat
 *
 * A root reached through a symbolic link is compared in resolved form
 * once the candidate path itself has been resolved.
 *
 * @module procfs/PathValidator
 */

import type { ProcfsBackend } from './types.js';

/** Highest identity the kernel can hand out (PID_MAX_LIMIT on 64-bit). */
export const PID_MAX: number = 4194304;

const PROCESS_RECORDS: ReadonlySet<string> = new Set(['stat', 'status', 'cmdline', 'task']);

/**
 * True when `segment` is all digits and denotes an identity in [1, PID_MAX].
 */
export function identity_isValid(segment: string): boolean {
    if (!/^\d{1,7}$/.test(segment)) return false;
    const value: number = Number.parseInt(segment, 10);
    return value >= 1 && value <= PID_MAX;
}

/**
 * Validates candidate record paths against a procfs root.
 */
export class PathValidator {
    private readonly rootSegments: string[];
    private resolvedRootSegments: string[] | null = null;

    constructor(
        private readonly backend: ProcfsBackend,
        private readonly root: string = '/proc'
    ) {
        this.rootSegments = path_segments(root);
    }

    /**
     * Check a path. Never throws; `false` means "skip this entity".
     */
    public async path_check(path: string): Promise<boolean> {
        try {
            if (this.shape_match(path, this.rootSegments) === 'reject') return false;

            const resolved: string | null = await this.backend.path_realpath(path);
            if (resolved === null) return false;

            const shape: Shape = this.shape_match(resolved, await this.resolvedRoot_get());
            if (shape === 'reject') return false;
            if (shape === 'dir') {
                return (await this.backend.node_kind(resolved)) === 'dir';
            }
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Segments of the root with links resolved. A root that cannot be
     * resolved is compared as configured and retried on the next check.
     */
    private async resolvedRoot_get(): Promise<string[]> {
        if (this.resolvedRootSegments !== null) return this.resolvedRootSegments;
        const resolved: string | null = await this.backend.path_realpath(this.root);
        if (resolved === null) return this.rootSegments;
        this.resolvedRootSegments = path_segments(resolved);
        return this.resolvedRootSegments;
    }

    /**
     * Purely lexical shape check. Any `.` or `..` segment is rejected
     * outright, so traversal never reaches the resolver.
     */
    private shape_match(path: string, rootSegments: string[]): Shape {
        if (!path.startsWith('/')) return 'reject';
        const segments: string[] = path_segments(path);
        if (segments.some((seg: string): boolean => seg === '.' || seg === '..')) return 'reject';

        const rootLength: number = rootSegments.length;
        for (let i: number = 0; i < rootLength; i++) {
            if (segments[i] !== rootSegments[i]) return 'reject';
        }

        const rest: string[] = segments.slice(rootLength);
        if (rest.length < 1 || !identity_isValid(rest[0])) return 'reject';

        switch (rest.length) {
            case 1:
                return 'dir';
            case 2:
                return PROCESS_RECORDS.has(rest[1]) ? 'file' : 'reject';
            case 3:
                return rest[1] === 'task' && identity_isValid(rest[2]) ? 'dir' : 'reject';
            case 4:
                return rest[1] === 'task' && identity_isValid(rest[2]) && rest[3] === 'stat' ? 'file' : 'reject';
            default:
                return 'reject';
        }
    }
}

type Shape = 'dir' | 'file' | 'reject';

function path_segments(path: string): string[] {
    return path.split('/').filter(Boolean);
}
