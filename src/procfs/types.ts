/**
 * @file Procfs Type Definitions
 *
 * The accessor interface the sampling engine reads the pseudo-filesystem
 * through. The engine never touches I/O directly: swap the backend and
 * everything else stays the same.
 *
 * Today: Node filesystem backend (the live `/proc`) and an in-memory
 * backend (fixtures and tests).
 *
 * Methods follow the project's RPN naming convention (subject_verb).
 *
 * @module procfs
 */

export type NodeKind = 'file' | 'dir';

/**
 * Backend-agnostic pseudo-filesystem accessor.
 *
 * Every method reports failure as `null`. Callers never learn why a read
 * failed (permission, race with an exiting process, absence); all of
 * those mean "skip this entity".
 */
export interface ProcfsBackend {
    /**
     * Read a whole file as UTF-8. Invalid byte sequences decode to U+FFFD,
     * so arbitrary content never fails to decode.
     */
    text_read(path: string): Promise<string | null>;

    /** List immediate children of a directory. Returns names, not full paths. */
    dir_list(path: string): Promise<string[] | null>;

    /** Resolve symbolic links and `.`/`..` segments to a canonical absolute path. */
    path_realpath(path: string): Promise<string | null>;

    /** Kind of the node at `path`, following symbolic links. */
    node_kind(path: string): Promise<NodeKind | null>;
}
