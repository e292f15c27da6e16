import { Schema } from "effect"

// whole points per factor
export const ScoringConfig = Schema.Struct({
  weight40Plus: Schema.Int,
  // 1 up to 2 years
  ageSweetSpot: Schema.Int,
  // 2 up to 4 years
  ageGood: Schema.Int,
  // 6 years and older
  ageSenior: Schema.Int,
  sheddingNone: Schema.Int,
  sheddingLow: Schema.Int,
  energyLowMedium: Schema.Int,
  goodWithDogs: Schema.Int,
  goodWithKids: Schema.Int,
  goodWithCats: Schema.Int,
  doodleBreed: Schema.Int,
  specialNeeds: Schema.Int,
  pendingPenalty: Schema.Int,
})
export type ScoringConfig = typeof ScoringConfig.Type

export const PartialScoringConfig = Schema.partial(ScoringConfig)
export type PartialScoringConfig = typeof PartialScoringConfig.Type

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weight40Plus: 2,
  ageSweetSpot: 2,
  ageGood: 1,
  ageSenior: -4,
  sheddingNone: 2,
  sheddingLow: 1,
  energyLowMedium: 2,
  goodWithDogs: 2,
  goodWithKids: 1,
  goodWithCats: 1,
  doodleBreed: 1,
  specialNeeds: -1,
  pendingPenalty: -8,
}

export const resolveScoringConfig = (config: PartialScoringConfig = {}): ScoringConfig => ({
  weight40Plus: config.weight40Plus ?? DEFAULT_SCORING_CONFIG.weight40Plus,
  ageSweetSpot: config.ageSweetSpot ?? DEFAULT_SCORING_CONFIG.ageSweetSpot,
  ageGood: config.ageGood ?? DEFAULT_SCORING_CONFIG.ageGood,
  ageSenior: config.ageSenior ?? DEFAULT_SCORING_CONFIG.ageSenior,
  sheddingNone: config.sheddingNone ?? DEFAULT_SCORING_CONFIG.sheddingNone,
  sheddingLow: config.sheddingLow ?? DEFAULT_SCORING_CONFIG.sheddingLow,
  energyLowMedium: config.energyLowMedium ?? DEFAULT_SCORING_CONFIG.energyLowMedium,
  goodWithDogs: config.goodWithDogs ?? DEFAULT_SCORING_CONFIG.goodWithDogs,
  goodWithKids: config.goodWithKids ?? DEFAULT_SCORING_CONFIG.goodWithKids,
  goodWithCats: config.goodWithCats ?? DEFAULT_SCORING_CONFIG.goodWithCats,
  doodleBreed: config.doodleBreed ?? DEFAULT_SCORING_CONFIG.doodleBreed,
  specialNeeds: config.specialNeeds ?? DEFAULT_SCORING_CONFIG.specialNeeds,
  pendingPenalty: config.pendingPenalty ?? DEFAULT_SCORING_CONFIG.pendingPenalty,
})

export const DogFilter = Schema.Literal("available", "pending", "upcoming", "all")
export type DogFilter = typeof DogFilter.Type

export const DogSort = Schema.Literal("fit-desc", "fit-asc", "name", "newest")
export type DogSort = typeof DogSort.Type

export const UserPreferences = Schema.Struct({
  userId: Schema.String,
  scoringConfig: PartialScoringConfig,
  defaultFilter: DogFilter,
  defaultSort: DogSort,
  defaultRescue: Schema.String,
  emailNotifications: Schema.Boolean,
  notifyOnNewDogs: Schema.Boolean,
  notifyOnStatusChanges: Schema.Boolean,
  notifyMinFitScore: Schema.Number,
})
export type UserPreferences = typeof UserPreferences.Type

export const defaultUserPreferences = (userId: string): UserPreferences => ({
  userId,
  scoringConfig: {},
  defaultFilter: "available",
  defaultSort: "fit-desc",
  defaultRescue: "all",
  emailNotifications: false,
  notifyOnNewDogs: true,
  notifyOnStatusChanges: true,
  notifyMinFitScore: 5,
})
