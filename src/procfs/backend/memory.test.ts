import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryProcfs } from './memory.js';

describe('MemoryProcfs', (): void => {
    let procfs: MemoryProcfs;

    beforeEach((): void => {
        procfs = new MemoryProcfs();
        procfs.file_write('/proc/42/stat', '42 (bash) S 1');
        procfs.file_write('/proc/43/stat', '43 (sh) S 42');
        procfs.file_write('/etc/passwd', 'root:x:0:0');
    });

    it('reads written files and lists directories', async (): Promise<void> => {
        expect(await procfs.text_read('/proc/42/stat')).toBe('42 (bash) S 1');
        expect(await procfs.dir_list('/proc')).toEqual(['42', '43']);
    });

    it('reports node kinds', async (): Promise<void> => {
        expect(await procfs.node_kind('/proc/42')).toBe('dir');
        expect(await procfs.node_kind('/proc/42/stat')).toBe('file');
        expect(await procfs.node_kind('/proc/99')).toBeNull();
    });

    it('returns null for reads of the wrong kind', async (): Promise<void> => {
        expect(await procfs.text_read('/proc/42')).toBeNull();
        expect(await procfs.dir_list('/proc/42/stat')).toBeNull();
        expect(await procfs.text_read('/proc/42/stat/x')).toBeNull();
    });

    it('resolves relative links against the link directory', async (): Promise<void> => {
        procfs.link_create('/proc/self', '42');
        expect(await procfs.path_realpath('/proc/self/stat')).toBe('/proc/42/stat');
        expect(await procfs.text_read('/proc/self/stat')).toBe('42 (bash) S 1');
    });

    it('resolves absolute links from the root', async (): Promise<void> => {
        procfs.link_create('/proc/42/cmdline', '/etc/passwd');
        expect(await procfs.path_realpath('/proc/42/cmdline')).toBe('/etc/passwd');
    });

    it('collapses dot segments', async (): Promise<void> => {
        expect(await procfs.path_realpath('/proc/42/../43/./stat')).toBe('/proc/43/stat');
        expect(await procfs.path_realpath('/../proc')).toBe('/proc');
    });

    it('gives up on link loops', async (): Promise<void> => {
        procfs.link_create('/tmp/a', 'b');
        procfs.link_create('/tmp/b', 'a');
        expect(await procfs.path_realpath('/tmp/a')).toBeNull();
    });

    it('removes subtrees and ignores missing paths', async (): Promise<void> => {
        procfs.node_remove('/proc/42');
        procfs.node_remove('/proc/404');
        expect(await procfs.text_read('/proc/42/stat')).toBeNull();
        expect(await procfs.dir_list('/proc')).toEqual(['43']);
    });

    it('refuses to create a directory through a file', (): void => {
        expect((): void => procfs.dir_create('/proc/42/stat/x')).toThrow(/Not a directory/);
    });

    it('refuses to overwrite a directory with a file', (): void => {
        expect((): void => procfs.file_write('/proc/42', 'x')).toThrow(/Is a directory/);
    });
});
