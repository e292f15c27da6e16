import { describe, expect, it } from "vitest"
import { Effect } from "effect"
import {
  Dal,
  adminEditEvent,
  defaultUserPreferences,
  emptyUserDogState,
  makeDog,
  type Dog,
} from "../src/index.js"
import { START, advance, makeMemoryDogStore, runWithDal } from "./support/memory-store.js"

const AT_5 = "2024-03-01T12:05:00.000Z"
const AT_10 = "2024-03-01T12:10:00.000Z"

const maple: Dog = makeDog({
  dogId: "doodle_rock_rescue_maple",
  dogName: "Maple",
  rescueName: "Doodle Rock Rescue",
  status: "Available",
  weightLbs: 45,
  ageYears: 1.5,
  shedding: "None",
  energyLevel: "Low",
  goodWithDogs: "Yes",
  breed: "Goldendoodle",
})

const bear: Dog = makeDog({
  dogId: "doodle_rock_rescue_bear",
  dogName: "Bear",
  rescueName: "Doodle Rock Rescue",
  status: "Available",
  weightLbs: 60,
})

const ace: Dog = makeDog({
  dogId: "poodle_patch_ace",
  dogName: "Ace",
  rescueName: "Poodle Patch",
})

describe("Dal.syncDog", () => {
  it("stores a new dog with its first_seen event", async () => {
    const memory = makeMemoryDogStore()
    const result = await runWithDal(memory, Effect.flatMap(Dal, (dal) => dal.syncDog(maple)))

    expect(result.created).toBe(true)
    expect(result.changed).toBe(true)
    expect(result.dog).toEqual({
      ...maple,
      baseFitScore: 11,
      createdAt: START,
      updatedAt: START,
      statusChangedAt: START,
      lastScrapedAt: START,
    })
    expect(result.events).toHaveLength(1)
    expect(result.events[0]).toMatchObject({
      eventType: "first_seen",
      dogId: maple.dogId,
      timestamp: START,
      summary: "First seen: Available (Fit Score: 11)",
    })
    expect(memory.dogs.get(maple.dogId)).toEqual(result.dog)
    expect(memory.events).toHaveLength(1)
  })

  it("records nothing for an identical scrape but notes the visit", async () => {
    const memory = makeMemoryDogStore()
    const result = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        yield* advance(5)
        return yield* dal.syncDog(maple)
      })
    )

    expect(result.created).toBe(false)
    expect(result.changed).toBe(false)
    expect(result.events).toEqual([])
    expect(result.dog.createdAt).toBe(START)
    expect(result.dog.updatedAt).toBe(START)
    expect(result.dog.statusChangedAt).toBe(START)
    expect(result.dog.lastScrapedAt).toBe(AT_5)
    expect(memory.events).toHaveLength(1)
  })

  it("records a status change and rescores", async () => {
    const memory = makeMemoryDogStore()
    const result = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        yield* advance(5)
        return yield* dal.syncDog({ ...maple, status: "Pending" })
      })
    )

    expect(result.events.map((event) => event.summary)).toEqual(["Application submitted - now pending"])
    expect(result.dog.baseFitScore).toBe(3)
    expect(result.dog.createdAt).toBe(START)
    expect(result.dog.statusChangedAt).toBe(AT_5)
    expect(result.dog.updatedAt).toBe(AT_5)
  })

  it("records field updates without touching the status timestamp", async () => {
    const memory = makeMemoryDogStore()
    const result = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        yield* advance(5)
        return yield* dal.syncDog({ ...maple, weightLbs: 50 })
      })
    )

    expect(result.events.map((event) => [event.eventType, event.summary])).toEqual([
      ["website_update", "Weight: 45 → 50 lbs"],
    ])
    expect(result.dog.statusChangedAt).toBe(START)
    expect(result.dog.updatedAt).toBe(AT_5)
  })

  it("reports several field changes in one update event", async () => {
    const memory = makeMemoryDogStore()
    const result = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        yield* advance(5)
        return yield* dal.syncDog({ ...maple, weightLbs: 50, shedding: "Low" })
      })
    )

    expect(result.events.map((event) => [event.eventType, event.summary])).toEqual([
      ["website_update", "Weight: 45 → 50 lbs; Shedding: None → Low"],
    ])
    expect(memory.events).toHaveLength(2)
  })

  it("keeps stored values a scrape leaves blank", async () => {
    const memory = makeMemoryDogStore()
    const [blank, available] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog({ ...maple, status: "Pending" })
        yield* advance(5)
        const blank = yield* dal.syncDog({ ...maple, status: "Unknown", weightLbs: null, shedding: null })
        yield* advance(5)
        const available = yield* dal.syncDog(maple)
        return [blank, available] as const
      })
    )

    expect(blank.events).toEqual([])
    expect(blank.changed).toBe(false)
    expect(blank.dog).toMatchObject({
      status: "Pending",
      weightLbs: 45,
      shedding: "None",
      baseFitScore: 3,
      statusChangedAt: START,
      updatedAt: START,
      lastScrapedAt: AT_5,
    })
    expect(available.events.map((event) => event.summary)).toEqual(["Became available again"])
    expect(available.dog.statusChangedAt).toBe(AT_10)
  })

  it("bumps updatedAt for untracked fields without an event", async () => {
    const memory = makeMemoryDogStore()
    const result = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        yield* advance(5)
        return yield* dal.syncDog({ ...maple, location: "Austin, TX" })
      })
    )

    expect(result.events).toEqual([])
    expect(result.changed).toBe(true)
    expect(result.dog.location).toBe("Austin, TX")
    expect(result.dog.updatedAt).toBe(AT_5)
  })

  it("rejects a dog without a name before writing", async () => {
    const memory = makeMemoryDogStore()
    const error = await runWithDal(
      memory,
      Effect.flatMap(Dal, (dal) => Effect.flip(dal.syncDog({ ...maple, dogName: "  " })))
    )

    expect(error._tag).toBe("ValidationError")
    expect(error._tag === "ValidationError" && error.field).toBe("dogName")
    expect(memory.dogs.size).toBe(0)
    expect(memory.events).toHaveLength(0)
  })

  it("saveDog returns the stored dog", async () => {
    const memory = makeMemoryDogStore()
    const saved = await runWithDal(memory, Effect.flatMap(Dal, (dal) => dal.saveDog(bear)))
    expect(saved.baseFitScore).toBe(2)
    expect(saved.lastScrapedAt).toBe(START)
  })
})

describe("Dal reads", () => {
  it("fails getDog for an unknown id and returns null from findDog", async () => {
    const memory = makeMemoryDogStore()
    const [error, found] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        const error = yield* Effect.flip(dal.getDog("nobody"))
        const found = yield* dal.findDog("nobody")
        return [error, found] as const
      })
    )

    expect(error).toMatchObject({ _tag: "NotFoundError", entity: "dog", id: "nobody" })
    expect(found).toBeNull()
  })

  it("lists active dogs by score then name", async () => {
    const memory = makeMemoryDogStore()
    const zed = makeDog({ dogId: "poodle_patch_zed", dogName: "Zed", isActive: false, ageYears: 8 })
    const [active, all, patch] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* Effect.forEach([zed, bear, ace, maple], dal.syncDog)
        const active = yield* dal.getAllDogs()
        const all = yield* dal.getAllDogs({ includeInactive: true })
        const patch = yield* dal.getAllDogs({ rescueName: "Poodle Patch" })
        return [active, all, patch] as const
      })
    )

    expect(active.map((dog) => dog.dogName)).toEqual(["Maple", "Bear", "Ace"])
    expect(all.map((dog) => dog.dogName)).toEqual(["Maple", "Bear", "Ace", "Zed"])
    expect(patch.map((dog) => dog.dogName)).toEqual(["Ace"])
  })

  it("computes scores without storing anything", async () => {
    const memory = makeMemoryDogStore()
    const score = await runWithDal(
      memory,
      Effect.map(Dal, (dal) => dal.computeFitScore(maple, { shedding: "High" }))
    )
    expect(score).toBe(9)
    expect(memory.dogs.size).toBe(0)
  })
})

describe("Dal.markMissingInactive", () => {
  it("deactivates dogs of the rescue that were not seen", async () => {
    const memory = makeMemoryDogStore()
    const events = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* Effect.forEach([maple, bear, ace], dal.syncDog)
        yield* advance(5)
        return yield* dal.markMissingInactive("Doodle Rock Rescue", [maple.dogId])
      })
    )

    expect(events).toHaveLength(1)
    expect(events[0]).toMatchObject({
      dogId: bear.dogId,
      eventType: "status_change",
      timestamp: AT_5,
      summary: "Status: Available → Inactive",
      payload: { dogName: "Bear", fromStatus: "Available", toStatus: "Inactive" },
    })
    expect(memory.dogs.get(bear.dogId)).toMatchObject({
      status: "Inactive",
      isActive: false,
      statusChangedAt: AT_5,
      updatedAt: AT_5,
    })
    expect(memory.dogs.get(maple.dogId)?.isActive).toBe(true)
    expect(memory.dogs.get(ace.dogId)?.isActive).toBe(true)
  })

  it("does nothing for an empty run", async () => {
    const memory = makeMemoryDogStore()
    const events = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        return yield* dal.markMissingInactive("Doodle Rock Rescue", [])
      })
    )

    expect(events).toEqual([])
    expect(memory.dogs.get(maple.dogId)?.isActive).toBe(true)
  })
})

describe("Dal events", () => {
  it("returns a dog's history oldest first and recent events newest first", async () => {
    const memory = makeMemoryDogStore()
    const [history, lastTwo, recent, firstSeen] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        yield* advance(5)
        yield* dal.syncDog({ ...maple, status: "Pending" })
        yield* advance(5)
        yield* dal.syncDog(maple)
        return [
          yield* dal.getDogEvents(maple.dogId),
          yield* dal.getDogEvents(maple.dogId, 2),
          yield* dal.getRecentEvents({ limit: 2 }),
          yield* dal.getRecentEvents({ eventType: "first_seen" }),
        ] as const
      })
    )

    expect(history.map((event) => event.timestamp)).toEqual([START, AT_5, AT_10])
    expect(lastTwo.map((event) => event.summary)).toEqual([
      "Application submitted - now pending",
      "Became available again",
    ])
    expect(recent.map((event) => event.summary)).toEqual([
      "Became available again",
      "Application submitted - now pending",
    ])
    expect(firstSeen.map((event) => event.eventType)).toEqual(["first_seen"])
  })

  it("returns no events for a limit of zero or less", async () => {
    const memory = makeMemoryDogStore()
    const [none, negative] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        return [yield* dal.getDogEvents(maple.dogId, 0), yield* dal.getDogEvents(maple.dogId, -1)] as const
      })
    )

    expect(none).toEqual([])
    expect(negative).toEqual([])
  })

  it("appends external events to the history", async () => {
    const memory = makeMemoryDogStore()
    const edit = adminEditEvent(
      {
        dogId: maple.dogId,
        field: "weightLbs",
        oldValue: 45,
        newValue: 48,
        reason: "vet visit",
        editedBy: "admin",
      },
      "2024-03-01T12:30:00.000Z"
    )
    const [history, error] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        yield* dal.appendEvent(edit)
        const error = yield* Effect.flip(dal.appendEvent({ ...edit, dogId: "" }))
        return [yield* dal.getDogEvents(maple.dogId), error] as const
      })
    )

    expect(history.map((event) => event.eventType)).toEqual(["first_seen", "admin_edit"])
    expect(history[1]).toEqual(edit)
    expect(error._tag).toBe("ValidationError")
  })
})

describe("Dal user state", () => {
  it("returns an empty state for a dog the user never touched", async () => {
    const memory = makeMemoryDogStore()
    const state = await runWithDal(memory, Effect.flatMap(Dal, (dal) => dal.getUserDogState("default_user", "x")))
    expect(state).toEqual(emptyUserDogState("default_user", "x"))
  })

  it("stamps timestamps and tracks when a dog was favorited", async () => {
    const memory = makeMemoryDogStore()
    const [first, second, third] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* dal.syncDog(maple)
        const first = yield* dal.saveUserDogState({
          ...emptyUserDogState("default_user", maple.dogId),
          favorite: true,
          overrides: { shedding: "High" },
        })
        yield* advance(5)
        const second = yield* dal.saveUserDogState({ ...first, notes: "meet on Saturday" })
        yield* advance(5)
        const third = yield* dal.saveUserDogState({ ...second, favorite: false })
        return [first, second, third] as const
      })
    )

    expect(first).toMatchObject({ computedFitScore: 9, createdAt: START, updatedAt: START, favoritedAt: START })
    expect(second).toMatchObject({ createdAt: START, updatedAt: AT_5, favoritedAt: START, notes: "meet on Saturday" })
    expect(third).toMatchObject({ createdAt: START, updatedAt: AT_10, favoritedAt: null })
    expect(memory.states.get(`default_user::${maple.dogId}`)).toEqual(third)
    expect(memory.dogs.get(maple.dogId)?.shedding).toBe("None")
  })

  it("leaves the cached score empty for an unknown dog", async () => {
    const memory = makeMemoryDogStore()
    const state = await runWithDal(
      memory,
      Effect.flatMap(Dal, (dal) => dal.saveUserDogState(emptyUserDogState("default_user", "ghost")))
    )
    expect(state.computedFitScore).toBeNull()
  })

  it("falls back to default preferences and stores updates", async () => {
    const memory = makeMemoryDogStore()
    const [before, after] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        const before = yield* dal.getUserPreferences("default_user")
        yield* dal.saveUserPreferences({ ...before, scoringConfig: { sheddingNone: 5 }, notifyMinFitScore: 7 })
        const after = yield* dal.getUserPreferences("default_user")
        return [before, after] as const
      })
    )

    expect(before).toEqual(defaultUserPreferences("default_user"))
    expect(after.scoringConfig).toEqual({ sheddingNone: 5 })
    expect(after.notifyMinFitScore).toBe(7)
  })
})

describe("Dal user data validation", () => {
  it("rejects a fractional score adjustment without storing it", async () => {
    const memory = makeMemoryDogStore()
    const error = await runWithDal(
      memory,
      Effect.flatMap(Dal, (dal) =>
        Effect.flip(
          dal.saveUserDogState({
            ...emptyUserDogState("default_user", maple.dogId),
            overrides: { manualScoreAdjustment: 1.5 },
          })
        )
      )
    )

    expect(error).toMatchObject({ _tag: "ValidationError", entity: "userDogState", field: "overrides.manualScoreAdjustment" })
    expect(memory.states.size).toBe(0)
  })

  it("rejects fractional scoring weights", async () => {
    const memory = makeMemoryDogStore()
    const [error, stored] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        const error = yield* Effect.flip(
          dal.saveUserPreferences({ ...defaultUserPreferences("default_user"), scoringConfig: { pendingPenalty: -2.5 } })
        )
        return [error, yield* dal.getUserPreferences("default_user")] as const
      })
    )

    expect(error).toMatchObject({ _tag: "ValidationError", entity: "userPreferences", field: "scoringConfig.pendingPenalty" })
    expect(stored).toEqual(defaultUserPreferences("default_user"))
  })
})

describe("Dal.applyUserOverrides", () => {
  it("scores each dog for the user without changing stored data", async () => {
    const memory = makeMemoryDogStore()
    const [personalized, stored] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const dal = yield* Dal
        yield* Effect.forEach([maple, bear], dal.syncDog)
        yield* dal.saveUserPreferences({ ...defaultUserPreferences("default_user"), scoringConfig: { weight40Plus: 10 } })
        yield* dal.saveUserDogState({
          ...emptyUserDogState("default_user", maple.dogId),
          overrides: { shedding: "High" },
        })
        const dogs = yield* dal.getAllDogs()
        return [yield* dal.applyUserOverrides(dogs, "default_user"), dogs] as const
      })
    )

    expect(personalized.map((entry) => [entry.dog.dogName, entry.fitScore])).toEqual([
      ["Maple", 17],
      ["Bear", 10],
    ])
    expect(personalized[1]?.state).toEqual(emptyUserDogState("default_user", bear.dogId))
    expect(stored.map((dog) => dog.baseFitScore)).toEqual([11, 2])
    expect(memory.dogs.get(maple.dogId)?.shedding).toBe("None")
  })
})
