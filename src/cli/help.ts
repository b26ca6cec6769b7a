/**
 * @file Usage Text
 *
 * @module cli/help
 */

/**
 * Usage text for `--help`, with `name` as the program name in examples.
 */
export function help_render(name: string): string {
    return `Process Monitor - Linux Process Statistics
Usage: ${name} [OPTIONS]

Options:
  -h, --help            Show this help message
      --limit=N         Show top N processes (default: 20)
      --sort=TYPE       Sort by: cpu, mem, pid, command, time (default: cpu)
      --watch[=N]       Refresh every N seconds (default: 2)
      --verbose         Show debug information
      --zombie          Include zombie processes
      --threads         Show thread information
      --thread-limit=N  Maximum threads per process (default: 1000)
      --max-scan=N      Maximum PIDs to scan (default: 131072)
      --kb              Show memory in kilobytes
      --mb              Show memory in megabytes (default)
      --json            Output in JSON format
      --cpu-mode=MODE   CPU%: auto, since-start, delta (default: auto)
      --proc-root=PATH  Proc filesystem root (default: /proc)
      --config=PATH     YAML config file

Environment:
  PROCTOP_LIMIT, PROCTOP_SORT, PROCTOP_INTERVAL, PROCTOP_THREAD_LIMIT,
  PROCTOP_MAX_SCAN, PROCTOP_MEMORY_UNIT, PROCTOP_CPU_MODE, PROCTOP_PROC_ROOT,
  PROCTOP_CONFIG (config file path)

Examples:
  ${name} --limit=10 --sort=mem
  ${name} --watch=5 --threads
  ${name} --verbose --zombie --kb
  ${name} --limit=20 --sort=cpu --json
  sudo ${name} --limit=20 --sort=cpu

Note: Some systems may require sudo/root privileges to read all process information.
`;
}
