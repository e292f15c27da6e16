import { Config, LogLevel } from "effect"

export interface AppConfig {
  readonly dbPath: string
  readonly userId: string
  readonly logLevel: LogLevel.LogLevel
}

export const appConfig = Config.all({
  dbPath: Config.string("PAWTRAIL_DB_PATH").pipe(Config.withDefault("pawtrail.db")),
  // single-user deployments; multi-user callers pass their own id
  userId: Config.string("PAWTRAIL_USER_ID").pipe(Config.withDefault("default_user")),
  logLevel: Config.logLevel("PAWTRAIL_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
})
