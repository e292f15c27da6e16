import { and, asc, desc, eq, type SQL } from "drizzle-orm"
import { Effect, Layer, Schema } from "effect"
import {
  Dog,
  DogEvent,
  DogStore,
  StorageError,
  UserDogState,
  UserPreferences,
  type DogFilters,
  type RecentEventsQuery,
} from "@pawtrail/core"
import { SqliteClient } from "./client.js"
import { dogEvents, dogs, userDogStates, userPreferences } from "./schema.js"

type DogRow = typeof dogs.$inferSelect
type EventRow = typeof dogEvents.$inferSelect

const storageError = (operation: "read" | "write", message: string) => (cause: unknown) =>
  new StorageError({
    operation,
    cause,
    message: `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
  })

const dogInput = ({ legacyKeys, ...row }: DogRow): unknown => (legacyKeys === null ? row : { ...row, legacyKeys })

const eventInput = ({ seq, ...row }: EventRow): unknown => row

const decodeDog = Schema.decodeUnknown(Dog)
const decodeDogSync = Schema.decodeUnknownSync(Dog)
const decodeEvent = Schema.decodeUnknown(DogEvent)
const decodeUserDogState = Schema.decodeUnknown(UserDogState)
const decodeUserPreferences = Schema.decodeUnknown(UserPreferences)

const dogRow = (dog: Dog): typeof dogs.$inferInsert => ({ ...dog, legacyKeys: dog.legacyKeys ?? null })

const eventRow = (event: DogEvent): typeof dogEvents.$inferInsert => ({
  eventId: event.eventId,
  dogId: event.dogId,
  eventType: event.eventType,
  timestamp: event.timestamp,
  source: event.source,
  summary: event.summary,
  createdBy: event.createdBy,
  payload: event.payload,
})

export const SqliteDogStoreLive = Layer.effect(
  DogStore,
  Effect.gen(function* () {
    const { db } = yield* SqliteClient

    const decodeEvents = (rows: ReadonlyArray<EventRow>) =>
      Effect.forEach(rows, (row) => decodeEvent(eventInput(row))).pipe(
        Effect.mapError(storageError("read", "Stored event is malformed"))
      )

    return DogStore.of({
      findDog: (dogId) =>
        Effect.gen(function* () {
          const row = yield* Effect.try({
            try: () => db.select().from(dogs).where(eq(dogs.dogId, dogId)).get(),
            catch: storageError("read", `Failed to read dog ${dogId}`),
          })
          if (row === undefined) return null
          return yield* decodeDog(dogInput(row)).pipe(
            Effect.mapError(storageError("read", `Stored dog ${dogId} is malformed`))
          )
        }),

      findDogs: (filters: DogFilters) =>
        Effect.gen(function* () {
          const conditions: SQL[] = []
          if (!filters.includeInactive) conditions.push(eq(dogs.isActive, true))
          if (filters.rescueName !== undefined) conditions.push(eq(dogs.rescueName, filters.rescueName))
          if (filters.status !== undefined) conditions.push(eq(dogs.status, filters.status))

          const rows = yield* Effect.try({
            try: () =>
              db
                .select()
                .from(dogs)
                .where(and(...conditions))
                .orderBy(asc(dogs.dogId))
                .all(),
            catch: storageError("read", "Failed to list dogs"),
          })
          return yield* Effect.forEach(rows, (row) => decodeDog(dogInput(row))).pipe(
            Effect.mapError(storageError("read", "Stored dog is malformed"))
          )
        }),

      readModifyWrite: (dogId, plan) =>
        Effect.try({
          try: () =>
            db.transaction((tx) => {
              const row = tx.select().from(dogs).where(eq(dogs.dogId, dogId)).get()
              const previous = row === undefined ? null : decodeDogSync(dogInput(row))
              const write = plan(previous)
              if (write.dog !== null) {
                const values = dogRow(write.dog)
                tx.insert(dogs).values(values).onConflictDoUpdate({ target: dogs.dogId, set: values }).run()
              }
              if (write.events.length > 0) {
                tx.insert(dogEvents).values(write.events.map(eventRow)).run()
              }
              return write.result
            }),
          catch: storageError("write", `Failed to save dog ${dogId}`),
        }),

      appendEvent: (event) =>
        Effect.try({
          try: () => {
            db.insert(dogEvents).values(eventRow(event)).run()
          },
          catch: storageError("write", `Failed to append event ${event.eventId}`),
        }),

      findEvents: (dogId, limit) =>
        Effect.gen(function* () {
          if (limit !== undefined && limit <= 0) return []
          // newest rows win the limit, returned in chronological order
          const rows = yield* Effect.try({
            try: () => {
              const query = db
                .select()
                .from(dogEvents)
                .where(eq(dogEvents.dogId, dogId))
                .orderBy(desc(dogEvents.timestamp), desc(dogEvents.seq))
              return limit === undefined ? query.all() : query.limit(limit).all()
            },
            catch: storageError("read", `Failed to read events for ${dogId}`),
          })
          return yield* decodeEvents([...rows].reverse())
        }),

      findRecentEvents: (query: RecentEventsQuery) =>
        Effect.gen(function* () {
          if (query.limit <= 0) return []
          const rows = yield* Effect.try({
            try: () =>
              db
                .select()
                .from(dogEvents)
                .where(query.eventType === undefined ? undefined : eq(dogEvents.eventType, query.eventType))
                .orderBy(desc(dogEvents.timestamp), desc(dogEvents.seq))
                .limit(query.limit)
                .all(),
            catch: storageError("read", "Failed to read recent events"),
          })
          return yield* decodeEvents(rows)
        }),

      findUserDogState: (userId, dogId) =>
        Effect.gen(function* () {
          const row = yield* Effect.try({
            try: () =>
              db
                .select()
                .from(userDogStates)
                .where(and(eq(userDogStates.userId, userId), eq(userDogStates.dogId, dogId)))
                .get(),
            catch: storageError("read", `Failed to read state of ${dogId} for ${userId}`),
          })
          if (row === undefined) return null
          return yield* decodeUserDogState(row).pipe(
            Effect.mapError(storageError("read", `Stored state of ${dogId} for ${userId} is malformed`))
          )
        }),

      findUserDogStates: (userId) =>
        Effect.gen(function* () {
          const rows = yield* Effect.try({
            try: () => db.select().from(userDogStates).where(eq(userDogStates.userId, userId)).all(),
            catch: storageError("read", `Failed to read states for ${userId}`),
          })
          return yield* Effect.forEach(rows, (row) => decodeUserDogState(row)).pipe(
            Effect.mapError(storageError("read", `Stored state for ${userId} is malformed`))
          )
        }),

      upsertUserDogState: (state) =>
        Effect.try({
          try: () => {
            db.insert(userDogStates)
              .values(state)
              .onConflictDoUpdate({ target: [userDogStates.userId, userDogStates.dogId], set: state })
              .run()
          },
          catch: storageError("write", `Failed to save state of ${state.dogId} for ${state.userId}`),
        }),

      findUserPreferences: (userId) =>
        Effect.gen(function* () {
          const row = yield* Effect.try({
            try: () => db.select().from(userPreferences).where(eq(userPreferences.userId, userId)).get(),
            catch: storageError("read", `Failed to read preferences for ${userId}`),
          })
          if (row === undefined) return null
          return yield* decodeUserPreferences(row).pipe(
            Effect.mapError(storageError("read", `Stored preferences for ${userId} are malformed`))
          )
        }),

      upsertUserPreferences: (preferences) =>
        Effect.try({
          try: () => {
            db.insert(userPreferences)
              .values(preferences)
              .onConflictDoUpdate({ target: userPreferences.userId, set: preferences })
              .run()
          },
          catch: storageError("write", `Failed to save preferences for ${preferences.userId}`),
        }),
    })
  })
)
