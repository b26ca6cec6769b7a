/**
 * @file In-Memory Procfs Backend
 *
 * POSIX-like in-memory tree with files, directories and symbolic links,
 * implementing ProcfsBackend. Used to stage process trees for tests and
 * fixtures without touching the live `/proc`.
 *
 * All methods follow the RPN naming convention: <subject>_<verb>.
 *
 * @module procfs/backend
 */

import type { NodeKind, ProcfsBackend } from '../types.js';

/** Symlink hops allowed during one resolution (Linux MAXSYMLINKS). */
const MAX_LINK_HOPS: number = 40;

interface MemoryNode {
    name: string;
    type: 'file' | 'dir' | 'link';
    content: string | null;
    target: string | null;
    children: Map<string, MemoryNode> | null;
}

interface ResolvedNode {
    node: MemoryNode;
    path: string;
}

/**
 * In-memory ProcfsBackend.
 *
 * @example
 * ```typescript
 * const procfs = new MemoryProcfs();
 * procfs.file_write('/proc/42/stat', '42 (bash) S 1 42 42 0 -1 ...');
 * procfs.link_create('/proc/self', '42');
 * await procfs.text_read('/proc/self/stat');
 * ```
 */
export class MemoryProcfs implements ProcfsBackend {
    private readonly root: MemoryNode = node_create('', 'dir');

    // ─── Tree Building ──────────────────────────────────────────

    /**
     * Creates a directory and any missing parents (like mkdir -p).
     * Throws if a path segment is an existing file or link.
     */
    public dir_create(path: string): void {
        let current: MemoryNode = this.root;
        for (const seg of path_segments(path)) {
            const children: Map<string, MemoryNode> = node_children(current, path);
            let child: MemoryNode | undefined = children.get(seg);
            if (!child) {
                child = node_create(seg, 'dir');
                children.set(seg, child);
            } else if (child.type !== 'dir') {
                throw new Error(`mkdir: ${path}: Not a directory`);
            }
            current = child;
        }
    }

    /**
     * Writes a file, replacing existing content. Parent directories are
     * created as needed.
     */
    public file_write(path: string, content: string): void {
        const parent: MemoryNode = this.parent_ensure(path);
        const name: string = path_basename(path);
        const existing: MemoryNode | undefined = node_children(parent, path).get(name);
        if (existing && existing.type === 'dir') {
            throw new Error(`write: ${path}: Is a directory`);
        }
        const node: MemoryNode = node_create(name, 'file');
        node.content = content;
        node_children(parent, path).set(name, node);
    }

    /**
     * Creates a symbolic link at `path` pointing at `target`. Relative
     * targets resolve against the link's directory.
     */
    public link_create(path: string, target: string): void {
        const parent: MemoryNode = this.parent_ensure(path);
        const name: string = path_basename(path);
        const node: MemoryNode = node_create(name, 'link');
        node.target = target;
        node_children(parent, path).set(name, node);
    }

    /**
     * Removes a node (and its subtree). Missing paths are ignored, which
     * mirrors a process exiting between listing and read.
     */
    public node_remove(path: string): void {
        const segments: string[] = path_segments(path);
        const name: string | undefined = segments.pop();
        if (name === undefined) return;

        let current: MemoryNode = this.root;
        for (const seg of segments) {
            const child: MemoryNode | undefined = current.children?.get(seg);
            if (!child) return;
            current = child;
        }
        current.children?.delete(name);
    }

    // ─── ProcfsBackend ──────────────────────────────────────────

    async text_read(path: string): Promise<string | null> {
        const resolved: ResolvedNode | null = this.node_resolve(path);
        if (!resolved || resolved.node.type !== 'file') return null;
        return resolved.node.content;
    }

    async dir_list(path: string): Promise<string[] | null> {
        const resolved: ResolvedNode | null = this.node_resolve(path);
        if (!resolved || !resolved.node.children) return null;
        return [...resolved.node.children.keys()];
    }

    async path_realpath(path: string): Promise<string | null> {
        const resolved: ResolvedNode | null = this.node_resolve(path);
        return resolved ? resolved.path : null;
    }

    async node_kind(path: string): Promise<NodeKind | null> {
        const resolved: ResolvedNode | null = this.node_resolve(path);
        if (!resolved) return null;
        return resolved.node.type === 'dir' ? 'dir' : 'file';
    }

    // ─── Internal Helpers ───────────────────────────────────────

    private parent_ensure(path: string): MemoryNode {
        const parentPath: string = path_parent(path);
        this.dir_create(parentPath);
        let current: MemoryNode = this.root;
        for (const seg of path_segments(parentPath)) {
            const child: MemoryNode | undefined = current.children?.get(seg);
            if (!child) throw new Error(`write: ${path}: Parent directory does not exist`);
            current = child;
        }
        return current;
    }

    /**
     * Walks a path the way realpath(3) does: `.` is dropped, `..` pops the
     * physical parent, and links are expanded in place. Returns null for
     * missing nodes, traversal through a file, or link loops.
     */
    private node_resolve(path: string): ResolvedNode | null {
        const pending: string[] = path_segments(path);
        const stack: MemoryNode[] = [this.root];
        const names: string[] = [];
        let hops: number = 0;

        while (pending.length > 0) {
            const seg: string | undefined = pending.shift();
            if (seg === undefined || seg === '.') continue;

            if (seg === '..') {
                if (stack.length > 1) {
                    stack.pop();
                    names.pop();
                }
                continue;
            }

            const current: MemoryNode = stack[stack.length - 1];
            const child: MemoryNode | undefined = current.children?.get(seg);
            if (!child) return null;

            if (child.type === 'link') {
                hops++;
                if (hops > MAX_LINK_HOPS || child.target === null) return null;
                if (child.target.startsWith('/')) {
                    stack.splice(1);
                    names.splice(0);
                }
                pending.unshift(...child.target.split('/').filter(Boolean));
                continue;
            }

            stack.push(child);
            names.push(seg);
        }

        return { node: stack[stack.length - 1], path: '/' + names.join('/') };
    }
}

// ─── Pure Helper Functions ──────────────────────────────────────

function node_create(name: string, type: MemoryNode['type']): MemoryNode {
    return {
        name,
        type,
        content: null,
        target: null,
        children: type === 'dir' ? new Map() : null
    };
}

function node_children(node: MemoryNode, path: string): Map<string, MemoryNode> {
    if (!node.children) {
        throw new Error(`${path}: Not a directory`);
    }
    return node.children;
}

function path_segments(path: string): string[] {
    return path.split('/').filter(Boolean);
}

function path_parent(path: string): string {
    const segments: string[] = path_segments(path);
    if (segments.length <= 1) return '/';
    return '/' + segments.slice(0, -1).join('/');
}

function path_basename(path: string): string {
    const segments: string[] = path_segments(path);
    return segments[segments.length - 1] || '';
}
