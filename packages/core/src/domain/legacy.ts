import { Effect, Schema } from "effect"
import {
  Compatibility,
  DogStatus,
  EnergyLevel,
  Shedding,
  makeDog,
  type Dog,
  type LegacyAliasKey,
  type RescueMeta,
} from "./dog.js"
import { LegacyFormatError } from "./errors.js"
import {
  normalizeCompatibility,
  normalizeEnergyLevel,
  normalizeShedding,
  normalizeStatus,
  parseWeightLbs,
} from "./normalize.js"

const text = <K extends string>(key: K) =>
  Schema.optionalWith(Schema.NullOr(Schema.String), { default: () => null }).pipe(Schema.fromKey(key))

const num = <K extends string>(key: K) =>
  Schema.optionalWith(Schema.NullOr(Schema.Number), { default: () => null }).pipe(Schema.fromKey(key))

const ZeroOne = Schema.transform(Schema.Literal(0, 1), Schema.Boolean, {
  strict: true,
  decode: (value) => value === 1,
  encode: (flag) => (flag ? 1 : 0),
})

// Blank text is absent; anything outside the vocabulary goes through its normalizer.
const vocabulary =
  <A extends string>(literals: Schema.Schema<A>, normalize: (text: string) => A) =>
  (value: string | null): A | null => {
    if (value === null || value.trim() === "") return null
    return Schema.is(literals)(value) ? value : normalize(value)
  }

const readStatus = (value: string | null): DogStatus => vocabulary(DogStatus, normalizeStatus)(value) ?? "Unknown"
const readCompatibility = vocabulary(Compatibility, normalizeCompatibility)
const readShedding = vocabulary(Shedding, normalizeShedding)
const readEnergyLevel = vocabulary(EnergyLevel, normalizeEnergyLevel)
const readSpecialNeeds = (value: string | null): boolean => value === "Yes"

const readWeight = (value: number | string | null): number | null => {
  if (typeof value !== "string") return value
  const trimmed = value.trim()
  if (trimmed === "") return null
  const numeric = Number(trimmed)
  return Number.isFinite(numeric) ? numeric : parseWeightLbs(trimmed)
}

/**
 * The flat row format of the old `dogs` table, one property per legacy key.
 * Decoding maps legacy keys to model fields, encoding maps them back.
 * Aliased fields are listed under their legacy key; `rescue_dog_url`,
 * `primary_image_url`, `age_display` and `weight_lbs` are folded in before decoding.
 * Status, compatibility, shedding, energy, special needs and weight are kept as
 * the text the row holds and parsed afterwards.
 */
export const LegacyDogRecord = Schema.Struct({
  dogId: Schema.optionalWith(Schema.String, { default: () => "" }).pipe(Schema.fromKey("dog_id")),
  dogName: Schema.optionalWith(Schema.String, { default: () => "" }).pipe(Schema.fromKey("dog_name")),
  rescueName: text("rescue_name"),
  rescueDogUrl: text("source_url"),
  platform: text("platform"),
  status: text("status"),
  isActive: Schema.optionalWith(ZeroOne, { default: () => true }).pipe(Schema.fromKey("is_active")),
  weightLbs: Schema.optionalWith(Schema.NullOr(Schema.Union(Schema.Number, Schema.String)), {
    default: () => null,
  }).pipe(Schema.fromKey("weight")),
  ageYears: num("age_years"),
  ageDisplay: text("age_range"),
  sex: text("sex"),
  breed: text("breed"),
  location: text("location"),
  goodWithDogs: text("good_with_dogs"),
  goodWithCats: text("good_with_cats"),
  goodWithKids: text("good_with_kids"),
  shedding: text("shedding"),
  energyLevel: text("energy_level"),
  specialNeeds: text("special_needs"),
  specialNeedsNotes: text("special_needs_notes"),
  adoptionFee: text("adoption_fee"),
  primaryImageUrl: text("image_url"),
  baseFitScore: num("fit_score"),
  createdAt: text("date_first_seen"),
  updatedAt: text("date_last_updated"),
  statusChangedAt: text("date_status_changed"),
  bioText: text("notes"),
  adoptionRequirementsText: text("adoption_req"),
})

export type LegacyDogDict = Readonly<Record<string, unknown>>

const ALIASES = [
  { legacy: "source_url", current: "rescue_dog_url" },
  { legacy: "image_url", current: "primary_image_url" },
  { legacy: "age_range", current: "age_display" },
  { legacy: "weight", current: "weight_lbs" },
] as const satisfies ReadonlyArray<{ legacy: LegacyAliasKey; current: LegacyAliasKey }>

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  ...Object.keys(Schema.encodeSync(LegacyDogRecord)(Schema.decodeUnknownSync(LegacyDogRecord)({}))),
  ...ALIASES.map((alias) => alias.current),
])

const RawRecord = Schema.Record({ key: Schema.String, value: Schema.Unknown })

/**
 * Builds a dog from a raw legacy mapping. Either alias of a renamed field is
 * accepted; which one was used is remembered so `dogToLegacyDict` can write
 * it back under the same key. Missing fields default to null.
 */
export const dogFromLegacy = (raw: unknown): Effect.Effect<Dog, LegacyFormatError> =>
  Effect.gen(function* () {
    const input = yield* Schema.decodeUnknown(RawRecord)(raw).pipe(
      Effect.mapError((e) => new LegacyFormatError({ cause: e, message: "Legacy dog record must be an object" }))
    )

    const fields: Record<string, unknown> = { ...input }
    const legacyKeys: LegacyAliasKey[] = []

    for (const { legacy, current } of ALIASES) {
      const hasLegacy = legacy in input
      const hasCurrent = current in input
      if (hasLegacy) legacyKeys.push(legacy)
      if (!hasCurrent) continue

      legacyKeys.push(current)
      if (hasLegacy && input[legacy] !== input[current]) {
        return yield* new LegacyFormatError({
          cause: { [legacy]: input[legacy], [current]: input[current] },
          message: `Conflicting values for ${legacy} and ${current}`,
        })
      }
      fields[legacy] = input[current]
      delete fields[current]
    }

    const record = yield* Schema.decodeUnknown(LegacyDogRecord)(fields).pipe(
      Effect.mapError((e) => new LegacyFormatError({ cause: e, message: `Invalid legacy dog record: ${e.message}` }))
    )

    const extra = Object.fromEntries(Object.entries(input).filter(([key]) => !KNOWN_KEYS.has(key)))
    const {
      bioText,
      adoptionRequirementsText,
      status,
      weightLbs,
      goodWithDogs,
      goodWithCats,
      goodWithKids,
      shedding,
      energyLevel,
      specialNeeds,
      ...plainFields
    } = record

    const parsed = {
      status: readStatus(status),
      weightLbs: readWeight(weightLbs),
      goodWithDogs: readCompatibility(goodWithDogs),
      goodWithCats: readCompatibility(goodWithCats),
      goodWithKids: readCompatibility(goodWithKids),
      shedding: readShedding(shedding),
      energyLevel: readEnergyLevel(energyLevel),
      specialNeeds: readSpecialNeeds(specialNeeds),
    }

    const rescueMeta: { -readonly [K in keyof RescueMeta]: RescueMeta[K] } = {}
    const keepText = (key: RawTextKey, raw: string | number | null, canonical: string | number | null) => {
      if (typeof raw === "string" && raw !== canonical) rescueMeta[key] = raw
    }
    keepText("statusText", status, parsed.status)
    keepText("weightText", weightLbs, parsed.weightLbs)
    keepText("goodWithDogsText", goodWithDogs, parsed.goodWithDogs)
    keepText("goodWithCatsText", goodWithCats, parsed.goodWithCats)
    keepText("goodWithKidsText", goodWithKids, parsed.goodWithKids)
    keepText("sheddingText", shedding, parsed.shedding)
    keepText("energyLevelText", energyLevel, parsed.energyLevel)
    keepText("specialNeedsText", specialNeeds, parsed.specialNeeds ? "Yes" : "No")
    if (bioText !== null) rescueMeta.bioText = bioText
    if (adoptionRequirementsText !== null) rescueMeta.adoptionRequirementsText = adoptionRequirementsText
    if (Object.keys(extra).length > 0) rescueMeta.extra = extra

    return makeDog({ ...plainFields, ...parsed, rescueMeta, legacyKeys })
  })

type RawTextKey =
  | "statusText"
  | "weightText"
  | "goodWithDogsText"
  | "goodWithCatsText"
  | "goodWithKidsText"
  | "sheddingText"
  | "energyLevelText"
  | "specialNeedsText"

// The rescue's own text, when it still reads as the stored value.
const verbatim = <A>(raw: string | undefined, read: (value: string) => A, value: A): string | undefined =>
  raw !== undefined && read(raw) === value ? raw : undefined

/**
 * Flat projection for code that still reads the old row format.
 */
export const dogToLegacyDict = (dog: Dog): LegacyDogDict => {
  const meta = dog.rescueMeta
  const encoded = Schema.encodeSync(LegacyDogRecord)({
    dogId: dog.dogId,
    dogName: dog.dogName,
    rescueName: dog.rescueName,
    rescueDogUrl: dog.rescueDogUrl,
    platform: dog.platform,
    status: verbatim(meta.statusText, readStatus, dog.status) ?? dog.status,
    isActive: dog.isActive,
    weightLbs: verbatim(meta.weightText, readWeight, dog.weightLbs) ?? dog.weightLbs,
    ageYears: dog.ageYears,
    ageDisplay: dog.ageDisplay,
    sex: dog.sex,
    breed: dog.breed,
    location: dog.location,
    goodWithDogs: verbatim(meta.goodWithDogsText, readCompatibility, dog.goodWithDogs) ?? dog.goodWithDogs,
    goodWithCats: verbatim(meta.goodWithCatsText, readCompatibility, dog.goodWithCats) ?? dog.goodWithCats,
    goodWithKids: verbatim(meta.goodWithKidsText, readCompatibility, dog.goodWithKids) ?? dog.goodWithKids,
    shedding: verbatim(meta.sheddingText, readShedding, dog.shedding) ?? dog.shedding,
    energyLevel: verbatim(meta.energyLevelText, readEnergyLevel, dog.energyLevel) ?? dog.energyLevel,
    specialNeeds:
      verbatim(meta.specialNeedsText, readSpecialNeeds, dog.specialNeeds) ?? (dog.specialNeeds ? "Yes" : "No"),
    specialNeedsNotes: dog.specialNeedsNotes,
    adoptionFee: dog.adoptionFee,
    primaryImageUrl: dog.primaryImageUrl,
    baseFitScore: dog.baseFitScore,
    createdAt: dog.createdAt,
    updatedAt: dog.updatedAt,
    statusChangedAt: dog.statusChangedAt,
    bioText: meta.bioText ?? null,
    adoptionRequirementsText: meta.adoptionRequirementsText ?? null,
  })

  const result: Record<string, unknown> = { ...meta.extra, ...encoded }
  const used = new Set(dog.legacyKeys ?? [])
  for (const { legacy, current } of ALIASES) {
    if (used.has(current)) {
      result[current] = result[legacy]
      if (!used.has(legacy)) delete result[legacy]
    }
  }
  return result
}
