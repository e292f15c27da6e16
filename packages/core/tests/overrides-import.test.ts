import { describe, expect, it } from "vitest"
import { Effect } from "effect"
import {
  Dal,
  LegacyFormatError,
  defaultUserPreferences,
  emptyUserDogState,
  importLegacyOverrides,
  makeDog,
} from "../src/index.js"
import { START, makeMemoryDogStore, runWithDal } from "./support/memory-store.js"

const EARLIER = "2024-01-01T00:00:00.000Z"

const maple = makeDog({
  dogId: "doodle_rock_rescue_maple",
  dogName: "Maple",
  status: "Available",
  weightLbs: 45,
  ageYears: 1.5,
  energyLevel: "Low",
  goodWithDogs: "Yes",
  breed: "Goldendoodle",
})

const seeded = () => {
  const memory = makeMemoryDogStore()
  memory.dogs.set(maple.dogId, maple)
  memory.states.set(`default_user::${maple.dogId}`, {
    ...emptyUserDogState("default_user", maple.dogId),
    overrides: { energyLevel: "High" },
    hidden: true,
    notes: "met at adoption day",
    createdAt: EARLIER,
    updatedAt: EARLIER,
  })
  memory.preferences.set("default_user", {
    ...defaultUserPreferences("default_user"),
    scoringConfig: { pendingPenalty: -3, doodleBreed: 0 },
  })
  return memory
}

const overridesFile = {
  dogs: {
    doodle_rock_rescue_maple: { shedding: "High", score_modifier: 2, watch_list: "Yes" },
    poodle_patch_ace: { weight: 50 },
  },
  scoringConfig: { doodle_breed: 3, age_neutral: 0 },
}

describe("importLegacyOverrides", () => {
  it("replaces overrides and favorites and merges weights", async () => {
    const memory = seeded()
    const [report, mapleState, aceState, preferences] = await runWithDal(
      memory,
      Effect.gen(function* () {
        const report = yield* importLegacyOverrides("default_user", overridesFile)
        const dal = yield* Dal
        return [
          report,
          yield* dal.getUserDogState("default_user", maple.dogId),
          yield* dal.getUserDogState("default_user", "poodle_patch_ace"),
          yield* dal.getUserPreferences("default_user"),
        ] as const
      })
    )

    expect(report).toEqual({ userId: "default_user", states: 2, scoringWeights: 1 })
    expect(preferences.scoringConfig).toEqual({ pendingPenalty: -3, doodleBreed: 3 })
    expect(mapleState).toEqual({
      userId: "default_user",
      dogId: maple.dogId,
      overrides: { shedding: "High", manualScoreAdjustment: 2 },
      favorite: true,
      hidden: true,
      applied: false,
      contactedRescue: false,
      notes: "met at adoption day",
      // 2 weight + 2 age + 2 energy + 2 dogs + 3 doodle + 2 manual
      computedFitScore: 13,
      createdAt: EARLIER,
      updatedAt: START,
      favoritedAt: START,
    })
    expect(aceState).toMatchObject({
      overrides: { weightLbs: 50 },
      favorite: false,
      computedFitScore: null,
      favoritedAt: null,
    })
  })

  it("writes nothing when the file is malformed", async () => {
    const memory = seeded()
    const error = await runWithDal(
      memory,
      Effect.flip(importLegacyOverrides("default_user", { dogs: { x: { shedding: "Fluffy" } } }))
    )

    expect(error).toBeInstanceOf(LegacyFormatError)
    expect(memory.states.size).toBe(1)
    expect(memory.preferences.get("default_user")?.scoringConfig).toEqual({ pendingPenalty: -3, doodleBreed: 0 })
  })

  it("rejects fractional points", async () => {
    const memory = seeded()
    const [modifier, weight] = await runWithDal(
      memory,
      Effect.all([
        Effect.flip(importLegacyOverrides("default_user", { dogs: { x: { score_modifier: 1.5 } } })),
        Effect.flip(importLegacyOverrides("default_user", { scoringConfig: { doodle_breed: 2.5 } })),
      ])
    )

    expect(modifier).toBeInstanceOf(LegacyFormatError)
    expect(weight).toBeInstanceOf(LegacyFormatError)
    expect(memory.states.size).toBe(1)
    expect(memory.preferences.get("default_user")?.scoringConfig).toEqual({ pendingPenalty: -3, doodleBreed: 0 })
  })
})
