export interface CliOptions {
  file?: string
  from?: number
  to?: number
  perLine: boolean
}

function parseLineIndex(value: string): number | undefined {
  const n = Number(value)
  return Number.isInteger(n) && n >= 0 ? n : undefined
}

/** `[file] [--from=N] [--to=N] [--per-line]`; unknown flags are ignored. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = { perLine: false }
  for (const arg of argv) {
    if (arg === '--per-line') opts.perLine = true
    else if (arg.startsWith('--from=')) opts.from = parseLineIndex(arg.slice('--from='.length))
    else if (arg.startsWith('--to=')) opts.to = parseLineIndex(arg.slice('--to='.length))
    else if (!arg.startsWith('--')) opts.file = arg
  }
  return opts
}
