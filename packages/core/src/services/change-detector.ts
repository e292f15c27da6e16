import { Data } from "effect"
import { effectivePrimaryImageUrl, type Dog, type DogStatus } from "../domain/dog.js"
import type { FieldDiff, FieldValue } from "../domain/event.js"

export type DogChange = Data.TaggedEnum<{
  FirstSeen: {}
  StatusChanged: {
    readonly field: "status"
    readonly oldValue: DogStatus
    readonly newValue: DogStatus
  }
  FieldsUpdated: { readonly changes: ReadonlyArray<FieldDiff> }
  ImagesAdded: { readonly urls: ReadonlyArray<string> }
}>

export const DogChange = Data.taggedEnum<DogChange>()

interface SignificantField {
  readonly field: string
  readonly read: (dog: Dog) => FieldValue
}

// status is tracked on its own, see detectChanges
export const SIGNIFICANT_FIELDS: ReadonlyArray<SignificantField> = [
  { field: "weightLbs", read: (dog) => dog.weightLbs },
  { field: "ageDisplay", read: (dog) => dog.ageDisplay },
  { field: "shedding", read: (dog) => dog.shedding },
  { field: "energyLevel", read: (dog) => dog.energyLevel },
  { field: "goodWithDogs", read: (dog) => dog.goodWithDogs },
  { field: "goodWithCats", read: (dog) => dog.goodWithCats },
  { field: "goodWithKids", read: (dog) => dog.goodWithKids },
  { field: "primaryImageUrl", read: effectivePrimaryImageUrl },
]

export const isBlank = (value: FieldValue): boolean => value === null || value === "" || value === "Unknown"

const sameValue = (a: FieldValue, b: FieldValue): boolean => a === b || (isBlank(a) && isBlank(b))

/**
 * Diffs a freshly scraped dog against the stored one.
 *
 * A brand new dog yields a single `FirstSeen`. Otherwise a status change is
 * reported alone, every other significant difference is folded into one
 * `FieldsUpdated`, and gallery urls not seen before become one `ImagesAdded`.
 * A value that disappeared from the scrape is not reported.
 */
export const detectChanges = (previous: Dog | null, next: Dog): ReadonlyArray<DogChange> => {
  if (previous === null) return [DogChange.FirstSeen()]

  const changes: DogChange[] = []

  if (!sameValue(previous.status, next.status) && !isBlank(next.status)) {
    changes.push(DogChange.StatusChanged({ field: "status", oldValue: previous.status, newValue: next.status }))
  }

  const diffs = SIGNIFICANT_FIELDS.flatMap(({ field, read }): FieldDiff[] => {
    const oldValue = read(previous)
    const newValue = read(next)
    return sameValue(oldValue, newValue) || isBlank(newValue) ? [] : [{ field, oldValue, newValue }]
  })
  if (diffs.length > 0) {
    changes.push(DogChange.FieldsUpdated({ changes: diffs }))
  }

  const knownUrls = new Set(previous.images.map((image) => image.url))
  const newUrls = next.images.map((image) => image.url).filter((url) => !knownUrls.has(url))
  if (newUrls.length > 0) {
    changes.push(DogChange.ImagesAdded({ urls: newUrls }))
  }

  return changes
}
