import { Effect, Schema } from "effect"
import { LegacyFormatError } from "./errors.js"
import type { PartialScoringConfig } from "./preferences.js"
import { LegacyUserOverride, userDogStateFromLegacy, type UserDogState } from "./user-state.js"

const points = <K extends string>(key: K) => Schema.optional(Schema.Int).pipe(Schema.fromKey(key))

/**
 * Scoring weights as the old overrides file spells them. Weights without a
 * counterpart here (`age_neutral`, `shedding_unknown` and friends) are dropped.
 */
export const LegacyScoringConfig = Schema.Struct({
  weight40Plus: points("weight_40_plus"),
  ageSweetSpot: points("age_sweet_spot"),
  ageGood: points("age_good"),
  ageSenior: points("age_senior"),
  sheddingNone: points("shedding_none"),
  sheddingLow: points("shedding_low"),
  energyLowMedium: points("energy_low_med"),
  goodWithDogs: points("good_with_dogs"),
  goodWithKids: points("good_with_kids"),
  goodWithCats: points("good_with_cats"),
  doodleBreed: points("doodle_breed"),
  specialNeeds: points("special_needs"),
  pendingPenalty: points("pending_penalty"),
})

export const LegacyOverridesFile = Schema.Struct({
  dogs: Schema.optionalWith(Schema.Record({ key: Schema.String, value: LegacyUserOverride }), {
    default: () => ({}),
  }),
  scoringConfig: Schema.optionalWith(LegacyScoringConfig, { default: () => ({}) }),
})
export type LegacyOverridesFile = typeof LegacyOverridesFile.Type

export interface ImportedOverrides {
  readonly states: ReadonlyArray<UserDogState>
  readonly scoringConfig: PartialScoringConfig
}

/**
 * Reads the contents of an old `user_overrides.json` for one user.
 */
export const overridesFromLegacy = (
  userId: string,
  raw: unknown
): Effect.Effect<ImportedOverrides, LegacyFormatError> =>
  Schema.decodeUnknown(LegacyOverridesFile)(raw).pipe(
    Effect.mapError((e) => new LegacyFormatError({ cause: e, message: `Invalid overrides file: ${e.message}` })),
    Effect.map((file) => ({
      states: Object.entries(file.dogs).map(([dogId, entry]) => userDogStateFromLegacy(userId, dogId, entry)),
      scoringConfig: file.scoringConfig,
    }))
  )
