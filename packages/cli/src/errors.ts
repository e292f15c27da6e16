import { Schema } from "effect"

export class CliError extends Schema.TaggedError<CliError>()("CliError", {
  reason: Schema.String,
}) {}
