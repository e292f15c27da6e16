import { Effect } from "effect"
import { makeDogId, type Dog } from "../domain/dog.js"
import type { LegacyFormatError, StorageError, ValidationError } from "../domain/errors.js"
import { dogFromLegacy } from "../domain/legacy.js"
import type { DogEvent } from "../domain/event.js"
import { Dal } from "./dal.js"

export interface IngestFailure {
  // position in the input batch
  readonly index: number
  readonly dogId: string | null
  readonly error: LegacyFormatError | ValidationError
}

export interface IngestReport {
  readonly rescueName: string
  readonly seen: number
  readonly added: number
  readonly updated: number
  readonly unchanged: number
  readonly deactivated: number
  readonly events: ReadonlyArray<DogEvent>
  readonly errors: ReadonlyArray<IngestFailure>
}

const withRescue = (dog: Dog, rescueName: string): Dog => {
  const owner = dog.rescueName || rescueName
  const dogId = dog.dogId === "" && dog.dogName !== "" ? makeDogId(owner, dog.dogName) : dog.dogId
  return { ...dog, dogId, rescueName: owner }
}

// The id a record names or would be stored under, read without decoding it.
const recordDogId = (record: unknown, rescueName: string): string | null => {
  if (typeof record !== "object" || record === null) return null
  if ("dog_id" in record && typeof record.dog_id === "string" && record.dog_id !== "") return record.dog_id
  if ("dog_name" in record && typeof record.dog_name === "string" && record.dog_name !== "") {
    const named = "rescue_name" in record && typeof record.rescue_name === "string" ? record.rescue_name : ""
    const owner = named || rescueName
    return makeDogId(owner, record.dog_name)
  }
  return null
}

/**
 * Syncs one rescue's scraped records, then deactivates the rescue's dogs the
 * run did not see. A bad record is reported and skipped; a storage failure
 * stops the run.
 */
export const ingestRescue = (
  rescueName: string,
  records: ReadonlyArray<unknown>
): Effect.Effect<IngestReport, StorageError, Dal> =>
  Effect.gen(function* () {
    const dal = yield* Dal

    const seenDogIds: string[] = []
    // still listed by the rescue, so never deactivated by this run
    const failedDogIds: string[] = []
    const events: DogEvent[] = []
    const errors: IngestFailure[] = []
    let added = 0
    let updated = 0
    let unchanged = 0

    for (const [index, record] of records.entries()) {
      const outcome = yield* dogFromLegacy(record).pipe(
        Effect.map((dog) => withRescue(dog, rescueName)),
        Effect.flatMap(dal.syncDog),
        Effect.either
      )

      if (outcome._tag === "Left") {
        const error = outcome.left
        if (error._tag === "StorageError") return yield* error
        yield* Effect.logWarning(`Skipping ${rescueName} record ${index}: ${error.message}`)
        const dogId = recordDogId(record, rescueName)
        if (dogId !== null) failedDogIds.push(dogId)
        errors.push({ index, dogId, error })
        continue
      }

      const result = outcome.right
      seenDogIds.push(result.dog.dogId)
      events.push(...result.events)
      if (result.created) added++
      else if (result.changed) updated++
      else unchanged++
    }

    // a run where nothing synced counts as a failed scrape
    const listedDogIds = seenDogIds.length === 0 ? [] : [...seenDogIds, ...failedDogIds]
    const deactivatedEvents = yield* dal.markMissingInactive(rescueName, listedDogIds)
    events.push(...deactivatedEvents)

    const report: IngestReport = {
      rescueName,
      seen: seenDogIds.length,
      added,
      updated,
      unchanged,
      deactivated: deactivatedEvents.length,
      events,
      errors,
    }
    yield* Effect.logInfo(
      `Ingested ${report.seen} dog(s) for ${rescueName}: ${added} new, ${updated} updated, ${unchanged} unchanged, ${report.deactivated} deactivated`
    )
    return report
  })
