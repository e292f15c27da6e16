import { Cause, Console, Effect, Exit, Layer, Logger, Option, Schema } from "effect"
import { readFileSync } from "node:fs"
import {
  Dal,
  DalLive,
  DogStatus,
  EventType,
  appConfig,
  dogToLegacyDict,
  importLegacyOverrides,
  ingestRescue,
} from "@pawtrail/core"
import { SqliteClient, SqliteClientLive, SqliteDogStoreLive } from "@pawtrail/db"
import { getBoolFlag, getIntFlag, getStringFlag, parseArgs } from "./args.js"
import { CliError } from "./errors.js"
import { formatDogLine, formatEventLine, formatIngestReport } from "./format.js"

const parsed = parseArgs(process.argv.slice(2))

const printUsage = Console.log(`
Pawtrail CLI

Usage:
  npm run cli -- <command> [options]

Commands:
  migrate                       Create or update the database schema
  ingest <file> --rescue <name> Sync a JSON array of scraped records for one rescue
  dogs                          List dogs with your fit scores
  show <dog-id>                 Print a dog in the legacy row format with its history
  events                        Print recent events
  import-overrides <file>       Import an old user_overrides.json

Options:
  --all                         Include inactive dogs (dogs)
  --rescue <name>               Only this rescue (dogs)
  --status <status>             Only this status (dogs)
  --dog <dog-id>                History of one dog (events)
  --type <event-type>           Only this event type (events)
  --limit <n>                   Number of events (events, default 20)
  --user <id>                   Act as this user instead of PAWTRAIL_USER_ID

Examples:
  npm run cli -- ingest ./scrapes/doodle-rock.json --rescue "Doodle Rock Rescue"
  npm run cli -- dogs --rescue "Doodle Rock Rescue"
  npm run cli -- events --type status_change --limit 10
`)

const readJson = (file: string) =>
  Effect.try({
    try: (): unknown => JSON.parse(readFileSync(file, "utf8")),
    catch: (e) => new CliError({ reason: `Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}` }),
  })

const requireArg = (name: string) =>
  parsed.commandArg === null
    ? Effect.fail(new CliError({ reason: `Missing ${name}` }))
    : Effect.succeed(parsed.commandArg)

const decodeFlag = <A, I>(schema: Schema.Schema<A, I>, key: string) =>
  Effect.gen(function* () {
    const value = getStringFlag(parsed.flags, key)
    if (value === undefined) return undefined
    const decoded = Schema.decodeUnknownOption(schema)(value)
    if (Option.isNone(decoded)) {
      return yield* new CliError({ reason: `Invalid --${key}: ${value}` })
    }
    return decoded.value
  })

const currentUser = appConfig.pipe(
  Effect.map((config) => getStringFlag(parsed.flags, "user") ?? config.userId)
)

const migrateCommand = Effect.gen(function* () {
  yield* SqliteClient
  const config = yield* appConfig
  yield* Console.log(`Database ready at ${config.dbPath}`)
})

const ingestCommand = Effect.gen(function* () {
  const file = yield* requireArg("<file>")
  const rescueName = getStringFlag(parsed.flags, "rescue")
  if (rescueName === undefined) {
    return yield* new CliError({ reason: "Missing --rescue <name>" })
  }
  const records = yield* readJson(file)
  if (!Array.isArray(records)) {
    return yield* new CliError({ reason: `${file} must contain a JSON array of records` })
  }
  const report = yield* ingestRescue(rescueName, records)
  yield* Effect.forEach(formatIngestReport(report), (line) => Console.log(line))
})

const dogsCommand = Effect.gen(function* () {
  const dal = yield* Dal
  const userId = yield* currentUser
  const status = yield* decodeFlag(DogStatus, "status")
  const rescueName = getStringFlag(parsed.flags, "rescue")

  const dogs = yield* dal.getAllDogs({
    includeInactive: getBoolFlag(parsed.flags, "all"),
    ...(rescueName !== undefined ? { rescueName } : {}),
    ...(status !== undefined ? { status } : {}),
  })
  const personalized = yield* dal.applyUserOverrides(dogs, userId)
  const visible = personalized.filter((entry) => !entry.state.hidden)

  yield* Console.log(`\n${visible.length} dog(s) for ${userId}\n`)
  yield* Effect.forEach(visible, (entry) => Console.log(formatDogLine(entry)))
})

const showCommand = Effect.gen(function* () {
  const dal = yield* Dal
  const dogId = yield* requireArg("<dog-id>")
  const dog = yield* dal.getDog(dogId)
  const events = yield* dal.getDogEvents(dogId)

  yield* Console.log(JSON.stringify(dogToLegacyDict(dog), null, 2))
  yield* Console.log("")
  yield* Effect.forEach(events, (event) => Console.log(formatEventLine(event)))
})

const eventsCommand = Effect.gen(function* () {
  const dal = yield* Dal
  const dogId = getStringFlag(parsed.flags, "dog")
  const eventType = yield* decodeFlag(EventType, "type")
  const limit = getIntFlag(parsed.flags, "limit", 20)

  const events =
    dogId !== undefined
      ? yield* dal.getDogEvents(dogId, limit)
      : yield* dal.getRecentEvents({ limit, ...(eventType !== undefined ? { eventType } : {}) })
  yield* Effect.forEach(events, (event) => Console.log(formatEventLine(event)))
})

const importOverridesCommand = Effect.gen(function* () {
  const file = yield* requireArg("<file>")
  const userId = yield* currentUser
  const raw = yield* readJson(file)
  const report = yield* importLegacyOverrides(userId, raw)
  yield* Console.log(
    `Imported ${report.states} dog state(s) and ${report.scoringWeights} scoring weight(s) for ${report.userId}`
  )
})

const AppLayer = DalLive.pipe(
  Layer.provideMerge(SqliteDogStoreLive),
  Layer.provideMerge(SqliteClientLive)
)

const withApp = <A, E>(command: Effect.Effect<A, E, Dal | SqliteClient>) =>
  Effect.gen(function* () {
    const config = yield* appConfig
    return yield* command.pipe(Effect.provide(AppLayer), Logger.withMinimumLogLevel(config.logLevel))
  })

const selectCommand = (command: string | null): Effect.Effect<unknown, unknown> => {
  switch (command) {
    case "migrate":
      return withApp(migrateCommand)
    case "ingest":
      return withApp(ingestCommand)
    case "dogs":
      return withApp(dogsCommand)
    case "show":
      return withApp(showCommand)
    case "events":
      return withApp(eventsCommand)
    case "import-overrides":
      return withApp(importOverridesCommand)
    case null:
    case "help":
      return printUsage
    default:
      return Effect.zipRight(Console.error(`Unknown command: ${command}`), printUsage)
  }
}

const main = async () => {
  const exit = await Effect.runPromiseExit(selectCommand(parsed.command))
  if (Exit.isFailure(exit)) {
    console.error(Cause.pretty(exit.cause))
    process.exit(1)
  }
}

main().catch((err: unknown) => {
  console.error("Unexpected error:", err)
  process.exit(1)
})
