import { Data } from "effect"

export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly entity: string
  readonly field: string
  readonly message: string
}> {}

export class LegacyFormatError extends Data.TaggedError("LegacyFormatError")<{
  readonly cause: unknown
  readonly message: string
}> {}

export class StorageError extends Data.TaggedError("StorageError")<{
  readonly operation: "read" | "write" | "delete"
  readonly cause: unknown
  readonly message: string
}> {}

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
  readonly entity: string
  readonly id: string
}> {}
