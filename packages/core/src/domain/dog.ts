import { Schema } from "effect"

export const DogStatus = Schema.Literal("Available", "Upcoming", "Pending", "Adopted", "Inactive", "Unknown")
export type DogStatus = typeof DogStatus.Type

export const Compatibility = Schema.Literal("Yes", "No", "Unknown")
export type Compatibility = typeof Compatibility.Type

export const Shedding = Schema.Literal("None", "Low", "Moderate", "High", "Unknown")
export type Shedding = typeof Shedding.Type

export const EnergyLevel = Schema.Literal("Low", "Medium", "High", "Unknown")
export type EnergyLevel = typeof EnergyLevel.Type

export const DogImage = Schema.Struct({
  url: Schema.String,
  // "rescue_website", "facebook", "admin_upload"
  source: Schema.String,
  // lower comes first
  priority: Schema.Number,
  caption: Schema.optional(Schema.String),
  addedAt: Schema.optional(Schema.String),
})
export type DogImage = typeof DogImage.Type

/**
 * What the rescue actually wrote, kept verbatim next to the parsed values.
 */
export const RescueMeta = Schema.Struct({
  weightText: Schema.optional(Schema.String),
  ageText: Schema.optional(Schema.String),
  breedText: Schema.optional(Schema.String),
  statusText: Schema.optional(Schema.String),
  bioHtml: Schema.optional(Schema.String),
  bioText: Schema.optional(Schema.String),

  rescueDogId: Schema.optional(Schema.String),
  rescueLocationCode: Schema.optional(Schema.String),

  goodWithDogsText: Schema.optional(Schema.String),
  goodWithCatsText: Schema.optional(Schema.String),
  goodWithKidsText: Schema.optional(Schema.String),
  sheddingText: Schema.optional(Schema.String),
  energyLevelText: Schema.optional(Schema.String),
  specialNeedsText: Schema.optional(Schema.String),

  crateTrained: Schema.optional(Schema.String),
  pottyTrained: Schema.optional(Schema.String),
  leashTrained: Schema.optional(Schema.String),

  spayNeuterStatus: Schema.optional(Schema.String),
  vaccinationStatus: Schema.optional(Schema.String),
  heartwormStatus: Schema.optional(Schema.String),

  adoptionFeeText: Schema.optional(Schema.String),
  adoptionRadiusText: Schema.optional(Schema.String),
  adoptionRequirementsText: Schema.optional(Schema.String),

  // raw fields nobody mapped yet
  extra: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
})
export type RescueMeta = typeof RescueMeta.Type

export const LegacyAliasKey = Schema.Literal(
  "source_url",
  "rescue_dog_url",
  "image_url",
  "primary_image_url",
  "age_range",
  "age_display",
  "weight",
  "weight_lbs"
)
export type LegacyAliasKey = typeof LegacyAliasKey.Type

export const Dog = Schema.Struct({
  // Identity
  dogId: Schema.String,
  dogName: Schema.String,

  // Rescue
  rescueName: Schema.NullOr(Schema.String),
  rescueDogUrl: Schema.NullOr(Schema.String),
  platform: Schema.NullOr(Schema.String),

  // Status
  status: DogStatus,
  isActive: Schema.Boolean,

  // Parsed attributes
  weightLbs: Schema.NullOr(Schema.Number),
  ageYears: Schema.NullOr(Schema.Number),
  ageDisplay: Schema.NullOr(Schema.String),
  sex: Schema.NullOr(Schema.String),
  breed: Schema.NullOr(Schema.String),
  location: Schema.NullOr(Schema.String),

  // Compatibility
  goodWithDogs: Schema.NullOr(Compatibility),
  goodWithCats: Schema.NullOr(Compatibility),
  goodWithKids: Schema.NullOr(Compatibility),

  // Characteristics
  shedding: Schema.NullOr(Shedding),
  energyLevel: Schema.NullOr(EnergyLevel),
  specialNeeds: Schema.Boolean,
  specialNeedsNotes: Schema.NullOr(Schema.String),
  adoptionFee: Schema.NullOr(Schema.String),

  // Images
  primaryImageUrl: Schema.NullOr(Schema.String),
  images: Schema.Array(DogImage),

  rescueMeta: RescueMeta,

  // Score with default weights and no user overrides
  baseFitScore: Schema.NullOr(Schema.Number),

  // Meta
  createdAt: Schema.NullOr(Schema.String),
  updatedAt: Schema.NullOr(Schema.String),
  statusChangedAt: Schema.NullOr(Schema.String),
  lastScrapedAt: Schema.NullOr(Schema.String),
  legacyKeys: Schema.optional(Schema.Array(LegacyAliasKey)),
})

export type Dog = typeof Dog.Type

export type CreateDog = Pick<Dog, "dogId" | "dogName"> & Partial<Omit<Dog, "dogId" | "dogName">>

export const makeDog = (input: CreateDog): Dog => ({
  rescueName: null,
  rescueDogUrl: null,
  platform: null,
  status: "Unknown",
  isActive: true,
  weightLbs: null,
  ageYears: null,
  ageDisplay: null,
  sex: null,
  breed: null,
  location: null,
  goodWithDogs: null,
  goodWithCats: null,
  goodWithKids: null,
  shedding: null,
  energyLevel: null,
  specialNeeds: false,
  specialNeedsNotes: null,
  adoptionFee: null,
  primaryImageUrl: null,
  images: [],
  rescueMeta: {},
  baseFitScore: null,
  createdAt: null,
  updatedAt: null,
  statusChangedAt: null,
  lastScrapedAt: null,
  ...input,
})

export const effectivePrimaryImageUrl = (dog: Dog): string | null => {
  if (dog.primaryImageUrl) return dog.primaryImageUrl
  const [first] = [...dog.images].sort((a, b) => a.priority - b.priority)
  return first?.url ?? null
}

export const slugify = (value: string): string =>
  value
    .toLowerCase()
    .trim()
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")

export const makeDogId = (rescueName: string, dogName: string): string =>
  `${slugify(rescueName)}_${slugify(dogName)}`
