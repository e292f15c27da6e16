import { Schema } from "effect"
import { Compatibility, EnergyLevel, Shedding } from "./dog.js"

/**
 * A user's corrections to global dog data. Unset fields defer to the dog;
 * an explicit "Unknown" is still a value.
 */
export const UserOverrides = Schema.Struct({
  shedding: Schema.optional(Shedding),
  energyLevel: Schema.optional(EnergyLevel),
  goodWithDogs: Schema.optional(Compatibility),
  goodWithCats: Schema.optional(Compatibility),
  goodWithKids: Schema.optional(Compatibility),
  weightLbs: Schema.optional(Schema.Number),
  ageYears: Schema.optional(Schema.Number),
  specialNeeds: Schema.optional(Schema.Boolean),
  manualScoreAdjustment: Schema.optional(Schema.Int),
})
export type UserOverrides = typeof UserOverrides.Type

export const hasOverrides = (overrides: UserOverrides): boolean =>
  Object.entries(overrides).some(([key, value]) =>
    key === "manualScoreAdjustment" ? value !== undefined && value !== 0 : value !== undefined
  )

export const UserDogState = Schema.Struct({
  userId: Schema.String,
  dogId: Schema.String,
  overrides: UserOverrides,
  favorite: Schema.Boolean,
  hidden: Schema.Boolean,
  applied: Schema.Boolean,
  contactedRescue: Schema.Boolean,
  notes: Schema.String,
  // derived, recomputed on demand
  computedFitScore: Schema.NullOr(Schema.Number),
  createdAt: Schema.NullOr(Schema.String),
  updatedAt: Schema.NullOr(Schema.String),
  favoritedAt: Schema.NullOr(Schema.String),
})
export type UserDogState = typeof UserDogState.Type

export const emptyUserDogState = (userId: string, dogId: string): UserDogState => ({
  userId,
  dogId,
  overrides: {},
  favorite: false,
  hidden: false,
  applied: false,
  contactedRescue: false,
  notes: "",
  computedFitScore: null,
  createdAt: null,
  updatedAt: null,
  favoritedAt: null,
})

/**
 * One entry of the old `user_overrides.json` file, keyed by dog id in `dogs`.
 */
export const LegacyUserOverride = Schema.Struct({
  shedding: Schema.optional(Shedding),
  energy_level: Schema.optional(EnergyLevel),
  good_with_dogs: Schema.optional(Compatibility),
  good_with_cats: Schema.optional(Compatibility),
  good_with_kids: Schema.optional(Compatibility),
  weight: Schema.optional(Schema.Number),
  score_modifier: Schema.optional(Schema.Int),
  watch_list: Schema.optional(Schema.String),
})
export type LegacyUserOverride = typeof LegacyUserOverride.Type

export const userDogStateFromLegacy = (
  userId: string,
  dogId: string,
  entry: LegacyUserOverride
): UserDogState => {
  const overrides: {
    -readonly [K in keyof UserOverrides]: UserOverrides[K]
  } = {}
  if (entry.shedding !== undefined) overrides.shedding = entry.shedding
  if (entry.energy_level !== undefined) overrides.energyLevel = entry.energy_level
  if (entry.good_with_dogs !== undefined) overrides.goodWithDogs = entry.good_with_dogs
  if (entry.good_with_cats !== undefined) overrides.goodWithCats = entry.good_with_cats
  if (entry.good_with_kids !== undefined) overrides.goodWithKids = entry.good_with_kids
  if (entry.weight !== undefined) overrides.weightLbs = entry.weight
  if (entry.score_modifier !== undefined) overrides.manualScoreAdjustment = entry.score_modifier

  return {
    ...emptyUserDogState(userId, dogId),
    overrides,
    favorite: entry.watch_list === "Yes",
  }
}

export const userDogStateToLegacy = (state: UserDogState): LegacyUserOverride => {
  const { overrides } = state
  return {
    ...(overrides.shedding !== undefined ? { shedding: overrides.shedding } : {}),
    ...(overrides.energyLevel !== undefined ? { energy_level: overrides.energyLevel } : {}),
    ...(overrides.goodWithDogs !== undefined ? { good_with_dogs: overrides.goodWithDogs } : {}),
    ...(overrides.goodWithCats !== undefined ? { good_with_cats: overrides.goodWithCats } : {}),
    ...(overrides.goodWithKids !== undefined ? { good_with_kids: overrides.goodWithKids } : {}),
    ...(overrides.weightLbs !== undefined ? { weight: overrides.weightLbs } : {}),
    ...(overrides.manualScoreAdjustment ? { score_modifier: overrides.manualScoreAdjustment } : {}),
    ...(state.favorite ? { watch_list: "Yes" } : {}),
  }
}
