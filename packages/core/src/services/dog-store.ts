import { Context, Effect, Layer } from "effect"
import type { Dog, DogStatus } from "../domain/dog.js"
import type { StorageError } from "../domain/errors.js"
import type { DogEvent, EventType } from "../domain/event.js"
import type { UserPreferences } from "../domain/preferences.js"
import type { UserDogState } from "../domain/user-state.js"

export interface DogFilters {
  readonly includeInactive?: boolean
  readonly rescueName?: string
  readonly status?: DogStatus
}

export interface RecentEventsQuery {
  readonly limit: number
  readonly eventType?: EventType
}

/**
 * What a read-modify-write decided. `dog: null` leaves the row untouched;
 * events are appended either way.
 */
export interface DogWrite<A> {
  readonly dog: Dog | null
  readonly events: ReadonlyArray<DogEvent>
  readonly result: A
}

export interface DogStore {
  readonly findDog: (dogId: string) => Effect.Effect<Dog | null, StorageError>
  readonly findDogs: (filters: DogFilters) => Effect.Effect<ReadonlyArray<Dog>, StorageError>
  /**
   * Reads the dog, hands it to `plan` and writes the outcome in one
   * transaction. Nothing is written when any part fails.
   */
  readonly readModifyWrite: <A>(
    dogId: string,
    plan: (previous: Dog | null) => DogWrite<A>
  ) => Effect.Effect<A, StorageError>
  readonly appendEvent: (event: DogEvent) => Effect.Effect<void, StorageError>
  // oldest first
  readonly findEvents: (dogId: string, limit?: number) => Effect.Effect<ReadonlyArray<DogEvent>, StorageError>
  // newest first
  readonly findRecentEvents: (query: RecentEventsQuery) => Effect.Effect<ReadonlyArray<DogEvent>, StorageError>
  readonly findUserDogState: (userId: string, dogId: string) => Effect.Effect<UserDogState | null, StorageError>
  readonly findUserDogStates: (userId: string) => Effect.Effect<ReadonlyArray<UserDogState>, StorageError>
  readonly upsertUserDogState: (state: UserDogState) => Effect.Effect<void, StorageError>
  readonly findUserPreferences: (userId: string) => Effect.Effect<UserPreferences | null, StorageError>
  readonly upsertUserPreferences: (preferences: UserPreferences) => Effect.Effect<void, StorageError>
}

export const DogStore = Context.GenericTag<DogStore>("@pawtrail/DogStore")

export const makeDogStore = (impl: DogStore): Layer.Layer<DogStore> => Layer.succeed(DogStore, impl)
