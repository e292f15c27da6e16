import { Clock, Context, Effect, Layer, ParseResult, Schema } from "effect"
import { isDeepStrictEqual } from "node:util"
import type { Dog } from "../domain/dog.js"
import { NotFoundError, ValidationError, type StorageError } from "../domain/errors.js"
import type { DogEvent, EventType, FieldValue, StatusChangeEvent } from "../domain/event.js"
import {
  UserPreferences,
  defaultUserPreferences,
  type PartialScoringConfig,
} from "../domain/preferences.js"
import { UserDogState, emptyUserDogState, type UserOverrides } from "../domain/user-state.js"
import { detectChanges, isBlank } from "./change-detector.js"
import { DogStore, type DogFilters } from "./dog-store.js"
import { eventsFromChanges, statusChangeEvent } from "./event-factory.js"
import { computeFitScore } from "./scoring.js"

export const DEFAULT_RECENT_EVENTS_LIMIT = 50

export interface SyncResult {
  readonly dog: Dog
  readonly events: ReadonlyArray<DogEvent>
  readonly created: boolean
  // stored content differs from what was there before
  readonly changed: boolean
}

export interface PersonalizedDog {
  readonly dog: Dog
  readonly state: UserDogState
  readonly fitScore: number
}

export interface RecentEventsOptions {
  readonly limit?: number
  readonly eventType?: EventType
}

export interface Dal {
  readonly getDog: (dogId: string) => Effect.Effect<Dog, NotFoundError | StorageError>
  readonly findDog: (dogId: string) => Effect.Effect<Dog | null, StorageError>
  readonly getAllDogs: (filters?: DogFilters) => Effect.Effect<ReadonlyArray<Dog>, StorageError>
  readonly saveDog: (dog: Dog) => Effect.Effect<Dog, ValidationError | StorageError>
  readonly syncDog: (dog: Dog) => Effect.Effect<SyncResult, ValidationError | StorageError>
  readonly markMissingInactive: (
    rescueName: string,
    seenDogIds: ReadonlyArray<string>
  ) => Effect.Effect<ReadonlyArray<StatusChangeEvent>, StorageError>
  readonly appendEvent: (event: DogEvent) => Effect.Effect<void, ValidationError | StorageError>
  readonly getDogEvents: (dogId: string, limit?: number) => Effect.Effect<ReadonlyArray<DogEvent>, StorageError>
  readonly getRecentEvents: (options?: RecentEventsOptions) => Effect.Effect<ReadonlyArray<DogEvent>, StorageError>
  readonly getUserDogState: (userId: string, dogId: string) => Effect.Effect<UserDogState, StorageError>
  readonly saveUserDogState: (state: UserDogState) => Effect.Effect<UserDogState, ValidationError | StorageError>
  readonly getUserPreferences: (userId: string) => Effect.Effect<UserPreferences, StorageError>
  readonly saveUserPreferences: (
    preferences: UserPreferences
  ) => Effect.Effect<UserPreferences, ValidationError | StorageError>
  readonly computeFitScore: (dog: Dog, overrides?: UserOverrides, config?: PartialScoringConfig) => number
  readonly applyUserOverrides: (
    dogs: ReadonlyArray<Dog>,
    userId: string
  ) => Effect.Effect<ReadonlyArray<PersonalizedDog>, StorageError>
}

export const Dal = Context.GenericTag<Dal>("@pawtrail/Dal")

const now = Clock.currentTimeMillis.pipe(Effect.map((millis) => new Date(millis).toISOString()))

// SQLite reads a negative LIMIT as no limit at all
const eventLimit = (limit: number): number => Math.max(0, Math.floor(limit))

const requireText = (entity: string, field: string, value: string) =>
  value.trim() === ""
    ? Effect.fail(new ValidationError({ entity, field, message: `${entity} ${field} must not be empty` }))
    : Effect.void

const validate = <A, I>(schema: Schema.Schema<A, I>, entity: string, value: A) =>
  Schema.validate(schema)(value).pipe(
    Effect.mapError((error) => {
      const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error)
      return new ValidationError({
        entity,
        field: issue?.path.map(String).join(".") ?? "",
        message: `${entity} is invalid: ${issue?.message ?? error.message}`,
      })
    })
  )

// Everything a save can change apart from its own bookkeeping.
const storedContent = (dog: Dog): unknown => {
  const { createdAt, updatedAt, statusChangedAt, lastScrapedAt, legacyKeys, ...content } = dog
  return JSON.parse(JSON.stringify(content))
}

const byFitScoreThenName = (a: Dog, b: Dog): number => {
  const scoreA = a.baseFitScore ?? Number.NEGATIVE_INFINITY
  const scoreB = b.baseFitScore ?? Number.NEGATIVE_INFINITY
  if (scoreA !== scoreB) return scoreB - scoreA
  return a.dogName.localeCompare(b.dogName)
}

const orStored = <A extends FieldValue>(scraped: A, stored: A): A => (isBlank(scraped) ? stored : scraped)

// A scrape that misses a significant value keeps the stored one, so what is
// stored never moves without an event.
const keepMissing = (previous: Dog, incoming: Dog): Dog => ({
  ...incoming,
  status: orStored(incoming.status, previous.status),
  weightLbs: orStored(incoming.weightLbs, previous.weightLbs),
  ageDisplay: orStored(incoming.ageDisplay, previous.ageDisplay),
  shedding: orStored(incoming.shedding, previous.shedding),
  energyLevel: orStored(incoming.energyLevel, previous.energyLevel),
  goodWithDogs: orStored(incoming.goodWithDogs, previous.goodWithDogs),
  goodWithCats: orStored(incoming.goodWithCats, previous.goodWithCats),
  goodWithKids: orStored(incoming.goodWithKids, previous.goodWithKids),
  primaryImageUrl: orStored(incoming.primaryImageUrl, previous.primaryImageUrl),
})

/**
 * Plans the stored version of a scraped dog. Values are taken from the scrape,
 * except significant values it left blank; only timestamps and the base score
 * are decided here.
 */
const planSave = (previous: Dog | null, scraped: Dog, timestamp: string) => {
  const incoming = previous === null ? scraped : keepMissing(previous, scraped)
  const changes = detectChanges(previous, incoming)
  const scored: Dog = { ...incoming, baseFitScore: computeFitScore(incoming) }

  if (previous === null) {
    const dog: Dog = {
      ...scored,
      createdAt: timestamp,
      updatedAt: timestamp,
      statusChangedAt: timestamp,
      lastScrapedAt: timestamp,
    }
    return { dog, events: eventsFromChanges(changes, dog, timestamp), changed: true }
  }

  const statusChanged = changes.some((change) => change._tag === "StatusChanged")
  const candidate: Dog = {
    ...scored,
    createdAt: previous.createdAt ?? timestamp,
    updatedAt: previous.updatedAt,
    statusChangedAt: statusChanged ? timestamp : previous.statusChangedAt,
    lastScrapedAt: timestamp,
  }
  const contentChanged = !isDeepStrictEqual(storedContent(previous), storedContent(candidate))
  const dog: Dog = contentChanged ? { ...candidate, updatedAt: timestamp } : candidate
  return { dog, events: eventsFromChanges(changes, dog, timestamp), changed: contentChanged }
}

export const DalLive = Layer.effect(
  Dal,
  Effect.gen(function* () {
    const store = yield* DogStore

    const getUserPreferences = (userId: string) =>
      store.findUserPreferences(userId).pipe(Effect.map((stored) => stored ?? defaultUserPreferences(userId)))

    const syncDog = (incoming: Dog) =>
      Effect.gen(function* () {
        yield* requireText("dog", "dogId", incoming.dogId)
        yield* requireText("dog", "dogName", incoming.dogName)
        const timestamp = yield* now

        const result = yield* store.readModifyWrite(incoming.dogId, (previous) => {
          const { dog, events, changed } = planSave(previous, incoming, timestamp)
          return { dog, events, result: { dog, events, created: previous === null, changed } }
        })

        if (result.created) {
          yield* Effect.logInfo(`New dog: ${result.dog.dogName} (${result.dog.dogId})`)
        } else if (result.events.length > 0) {
          yield* Effect.logDebug(`Recorded ${result.events.length} change(s) for ${result.dog.dogId}`)
        }
        return result
      })

    const deactivate = (dogId: string, timestamp: string) =>
      store.readModifyWrite<StatusChangeEvent | null>(dogId, (previous) => {
        if (previous === null || !previous.isActive) {
          return { dog: null, events: [], result: null }
        }
        const inactive: Dog = { ...previous, status: "Inactive", isActive: false }
        const dog: Dog = {
          ...inactive,
          baseFitScore: computeFitScore(inactive),
          updatedAt: timestamp,
          statusChangedAt: timestamp,
        }
        const event = statusChangeEvent(dog, previous.status, "Inactive", timestamp)
        return { dog, events: [event], result: event }
      })

    const markMissingInactive = (rescueName: string, seenDogIds: ReadonlyArray<string>) =>
      Effect.gen(function* () {
        // an empty run is a failed scrape
        if (seenDogIds.length === 0) {
          yield* Effect.logWarning(`No dogs seen for ${rescueName}, skipping deactivation`)
          return []
        }
        const seen = new Set(seenDogIds)
        const active = yield* store.findDogs({ rescueName })
        const missing = active.filter((dog) => !seen.has(dog.dogId))
        const timestamp = yield* now

        const events: StatusChangeEvent[] = []
        for (const dog of missing) {
          const event = yield* deactivate(dog.dogId, timestamp)
          if (event !== null) events.push(event)
        }
        if (events.length > 0) {
          yield* Effect.logInfo(`Marked ${events.length} dog(s) inactive for ${rescueName}`)
        }
        return events
      })

    const getUserDogState = (userId: string, dogId: string) =>
      store.findUserDogState(userId, dogId).pipe(Effect.map((stored) => stored ?? emptyUserDogState(userId, dogId)))

    const saveUserDogState = (state: UserDogState) =>
      Effect.gen(function* () {
        yield* requireText("userDogState", "userId", state.userId)
        yield* requireText("userDogState", "dogId", state.dogId)
        yield* validate(UserDogState, "userDogState", state)
        const timestamp = yield* now
        const existing = yield* store.findUserDogState(state.userId, state.dogId)
        const dog = yield* store.findDog(state.dogId)
        const preferences = yield* getUserPreferences(state.userId)

        const favoritedAt = !state.favorite
          ? null
          : existing?.favorite
            ? existing.favoritedAt ?? timestamp
            : timestamp

        const stored: UserDogState = {
          ...state,
          computedFitScore: dog === null ? null : computeFitScore(dog, state.overrides, preferences.scoringConfig),
          createdAt: existing?.createdAt ?? timestamp,
          updatedAt: timestamp,
          favoritedAt,
        }
        yield* store.upsertUserDogState(stored)
        return stored
      })

    const saveUserPreferences = (preferences: UserPreferences) =>
      requireText("userPreferences", "userId", preferences.userId).pipe(
        Effect.zipRight(validate(UserPreferences, "userPreferences", preferences)),
        Effect.zipRight(store.upsertUserPreferences(preferences)),
        Effect.as(preferences)
      )

    const applyUserOverrides = (dogs: ReadonlyArray<Dog>, userId: string) =>
      Effect.gen(function* () {
        const preferences = yield* getUserPreferences(userId)
        const states = yield* store.findUserDogStates(userId)
        const byDogId = new Map(states.map((state) => [state.dogId, state]))

        return dogs
          .map((dog): PersonalizedDog => {
            const state = byDogId.get(dog.dogId) ?? emptyUserDogState(userId, dog.dogId)
            return { dog, state, fitScore: computeFitScore(dog, state.overrides, preferences.scoringConfig) }
          })
          .sort((a, b) => b.fitScore - a.fitScore)
      })

    return Dal.of({
      getDog: (dogId) =>
        store
          .findDog(dogId)
          .pipe(
            Effect.flatMap((dog) =>
              dog === null ? Effect.fail(new NotFoundError({ entity: "dog", id: dogId })) : Effect.succeed(dog)
            )
          ),
      findDog: store.findDog,
      getAllDogs: (filters = {}) =>
        store.findDogs(filters).pipe(Effect.map((dogs) => [...dogs].sort(byFitScoreThenName))),
      saveDog: (dog) => syncDog(dog).pipe(Effect.map((result) => result.dog)),
      syncDog,
      markMissingInactive,
      appendEvent: (event) =>
        requireText("event", "dogId", event.dogId).pipe(Effect.zipRight(store.appendEvent(event))),
      getDogEvents: (dogId, limit) => store.findEvents(dogId, limit === undefined ? undefined : eventLimit(limit)),
      getRecentEvents: (options = {}) =>
        store.findRecentEvents({
          limit: eventLimit(options.limit ?? DEFAULT_RECENT_EVENTS_LIMIT),
          ...(options.eventType !== undefined ? { eventType: options.eventType } : {}),
        }),
      getUserDogState,
      saveUserDogState,
      getUserPreferences,
      saveUserPreferences,
      computeFitScore,
      applyUserOverrides,
    })
  })
)
