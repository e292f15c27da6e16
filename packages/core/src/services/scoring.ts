import type { Compatibility, Dog, EnergyLevel, Shedding } from "../domain/dog.js"
import { parseAgeYears } from "../domain/normalize.js"
import { resolveScoringConfig, type PartialScoringConfig, type ScoringConfig } from "../domain/preferences.js"
import type { UserOverrides } from "../domain/user-state.js"

export const GOOD_FIT_THRESHOLD = 5

interface ScoringInput {
  readonly status: Dog["status"]
  readonly breed: string | null
  readonly weightLbs: number | null
  readonly ageYears: number | null
  readonly shedding: Shedding | null
  readonly energyLevel: EnergyLevel | null
  readonly goodWithDogs: Compatibility | null
  readonly goodWithCats: Compatibility | null
  readonly goodWithKids: Compatibility | null
  readonly specialNeeds: boolean
  readonly manualScoreAdjustment: number
}

// an override always wins, even an explicit "Unknown"
const effectiveInput = (dog: Dog, overrides: UserOverrides): ScoringInput => ({
  status: dog.status,
  breed: dog.breed,
  weightLbs: overrides.weightLbs ?? dog.weightLbs,
  ageYears: overrides.ageYears ?? dog.ageYears ?? parseAgeYears(dog.ageDisplay),
  shedding: overrides.shedding ?? dog.shedding,
  energyLevel: overrides.energyLevel ?? dog.energyLevel,
  goodWithDogs: overrides.goodWithDogs ?? dog.goodWithDogs,
  goodWithCats: overrides.goodWithCats ?? dog.goodWithCats,
  goodWithKids: overrides.goodWithKids ?? dog.goodWithKids,
  specialNeeds: overrides.specialNeeds ?? dog.specialNeeds,
  manualScoreAdjustment: overrides.manualScoreAdjustment ?? 0,
})

const agePoints = (age: number | null, config: ScoringConfig): number => {
  if (age === null) return 0
  if (age >= 1 && age < 2) return config.ageSweetSpot
  if (age >= 2 && age < 4) return config.ageGood
  if (age >= 6) return config.ageSenior
  return 0
}

const sheddingPoints = (shedding: Shedding | null, config: ScoringConfig): number => {
  if (shedding === "None") return config.sheddingNone
  if (shedding === "Low") return config.sheddingLow
  return 0
}

const DOODLE_PATTERN = /doodle|poodle/i

const score = (input: ScoringInput, config: ScoringConfig): number => {
  let total = 0

  if (input.weightLbs !== null && input.weightLbs >= 40) total += config.weight40Plus
  total += agePoints(input.ageYears, config)
  total += sheddingPoints(input.shedding, config)
  if (input.energyLevel === "Low" || input.energyLevel === "Medium") total += config.energyLowMedium

  if (input.goodWithDogs === "Yes") total += config.goodWithDogs
  if (input.goodWithKids === "Yes") total += config.goodWithKids
  if (input.goodWithCats === "Yes") total += config.goodWithCats

  if (input.breed !== null && DOODLE_PATTERN.test(input.breed)) total += config.doodleBreed
  if (input.specialNeeds) total += config.specialNeeds
  if (input.status === "Pending") total += config.pendingPenalty

  return total + input.manualScoreAdjustment
}

/**
 * Fit score for a dog, optionally seen through one user's overrides and
 * custom weights. Unset weights fall back to the defaults. Missing and
 * "Unknown" attributes contribute nothing. The result is not clamped.
 */
export const computeFitScore = (
  dog: Dog,
  overrides: UserOverrides = {},
  config: PartialScoringConfig = {}
): number => score(effectiveInput(dog, overrides), resolveScoringConfig(config))

export const isGoodFit = (fitScore: number | null, threshold: number = GOOD_FIT_THRESHOLD): boolean =>
  fitScore !== null && fitScore >= threshold
