export interface ParsedArgs {
  readonly command: string | null
  readonly commandArg: string | null
  readonly flags: ReadonlyMap<string, string | boolean>
}

export const parseArgs = (argv: ReadonlyArray<string>): ParsedArgs => {
  const flags = new Map<string, string | boolean>()
  let command: string | null = null
  let commandArg: string | null = null

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === undefined) continue
    if (arg.startsWith("--")) {
      const key = arg.slice(2)
      const next = argv[i + 1]
      if (next !== undefined && !next.startsWith("-")) {
        flags.set(key, next)
        i++
      } else {
        flags.set(key, true)
      }
    } else if (command === null) {
      command = arg
    } else if (commandArg === null) {
      commandArg = arg
    }
  }

  return { command, commandArg, flags }
}

export const getStringFlag = (flags: ParsedArgs["flags"], key: string): string | undefined => {
  const value = flags.get(key)
  return typeof value === "string" ? value : undefined
}

export const getIntFlag = (flags: ParsedArgs["flags"], key: string, defaultValue: number): number => {
  const value = getStringFlag(flags, key)
  if (value === undefined) return defaultValue
  const parsed = parseInt(value, 10)
  return isNaN(parsed) ? defaultValue : parsed
}

export const getBoolFlag = (flags: ParsedArgs["flags"], key: string): boolean => flags.get(key) === true
