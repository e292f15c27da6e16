import { randomUUID } from "node:crypto"
import { slugify, type Dog, type DogStatus } from "../domain/dog.js"
import type {
  AdminEditEvent,
  DogEvent,
  FbPostEvent,
  FieldDiff,
  FieldValue,
  FirstSeenEvent,
  ImageAddedEvent,
  StatusChangeEvent,
  WebsiteUpdateEvent,
} from "../domain/event.js"
import { DogChange } from "./change-detector.js"

export const SYSTEM_ACTOR = "system"

const MAX_LISTED_CHANGES = 3

// "Doodle Rock Rescue" -> "doodle_rock_rescue_website"
export const scrapeSource = (dog: Dog): string =>
  dog.rescueName ? `${slugify(dog.rescueName)}_website` : SYSTEM_ACTOR

const FIELD_LABELS: Readonly<Record<string, string>> = {
  weightLbs: "Weight",
  ageDisplay: "Age",
  shedding: "Shedding",
  energyLevel: "Energy",
  goodWithDogs: "Good with dogs",
  goodWithCats: "Good with cats",
  goodWithKids: "Good with kids",
  primaryImageUrl: "Photo",
}

const display = (value: FieldValue): string => (value === null || value === "" ? "?" : String(value))

const describeChange = ({ field, oldValue, newValue }: FieldDiff): string => {
  const label = FIELD_LABELS[field] ?? field
  if (field === "primaryImageUrl") return "Photo changed"
  if (field === "weightLbs") return `${label}: ${display(oldValue)} → ${display(newValue)} lbs`
  return `${label}: ${display(oldValue)} → ${display(newValue)}`
}

export const statusChangeSummary = (fromStatus: DogStatus, toStatus: DogStatus): string => {
  if (toStatus === "Pending") return "Application submitted - now pending"
  if (toStatus === "Available" && fromStatus === "Pending") return "Became available again"
  if (toStatus === "Adopted") return "Adopted"
  return `Status: ${fromStatus} → ${toStatus}`
}

export const firstSeenEvent = (dog: Dog, timestamp: string): FirstSeenEvent => ({
  eventId: randomUUID(),
  dogId: dog.dogId,
  eventType: "first_seen",
  timestamp,
  source: scrapeSource(dog),
  summary:
    dog.baseFitScore !== null
      ? `First seen: ${dog.status} (Fit Score: ${dog.baseFitScore})`
      : `First seen: ${dog.status}`,
  createdBy: SYSTEM_ACTOR,
  payload: {
    dogName: dog.dogName,
    rescueName: dog.rescueName,
    initialStatus: dog.status,
    initialFitScore: dog.baseFitScore,
  },
})

export const statusChangeEvent = (
  dog: Dog,
  fromStatus: DogStatus,
  toStatus: DogStatus,
  timestamp: string,
  source: string = scrapeSource(dog)
): StatusChangeEvent => ({
  eventId: randomUUID(),
  dogId: dog.dogId,
  eventType: "status_change",
  timestamp,
  source,
  summary: statusChangeSummary(fromStatus, toStatus),
  createdBy: SYSTEM_ACTOR,
  payload: { dogName: dog.dogName, fromStatus, toStatus },
})

export const websiteUpdateEvent = (
  dog: Dog,
  changes: ReadonlyArray<FieldDiff>,
  timestamp: string
): WebsiteUpdateEvent => {
  const listed = changes.slice(0, MAX_LISTED_CHANGES).map(describeChange).join("; ")
  const rest = changes.length - MAX_LISTED_CHANGES
  return {
    eventId: randomUUID(),
    dogId: dog.dogId,
    eventType: "website_update",
    timestamp,
    source: scrapeSource(dog),
    summary: rest > 0 ? `${listed} (+${rest} more)` : listed,
    createdBy: SYSTEM_ACTOR,
    payload: { dogName: dog.dogName, changes: [...changes] },
  }
}

export const imageAddedEvent = (
  dog: Dog,
  imageUrls: ReadonlyArray<string>,
  timestamp: string,
  imageSource: string = "rescue_website"
): ImageAddedEvent => ({
  eventId: randomUUID(),
  dogId: dog.dogId,
  eventType: "image_added",
  timestamp,
  source: scrapeSource(dog),
  summary:
    imageUrls.length === 1
      ? `New image added from ${imageSource}`
      : `${imageUrls.length} new images added from ${imageSource}`,
  createdBy: SYSTEM_ACTOR,
  payload: { imageUrls: [...imageUrls], imageSource },
})

export interface AdminEdit {
  readonly dogId: string
  readonly field: string
  readonly oldValue: FieldValue
  readonly newValue: FieldValue
  readonly reason: string
  readonly editedBy: string
}

export const adminEditEvent = (edit: AdminEdit, timestamp: string): AdminEditEvent => ({
  eventId: randomUUID(),
  dogId: edit.dogId,
  eventType: "admin_edit",
  timestamp,
  source: "admin",
  summary: edit.reason ? `Admin corrected ${edit.field}: ${edit.reason}` : `Admin corrected ${edit.field}`,
  createdBy: edit.editedBy,
  payload: { field: edit.field, oldValue: edit.oldValue, newValue: edit.newValue, reason: edit.reason },
})

export interface FbPost {
  readonly dogId: string
  readonly rescueName: string | null
  readonly postUrl: string
  readonly postDate: string
  readonly summary?: string
}

export const fbPostEvent = (post: FbPost, timestamp: string): FbPostEvent => ({
  eventId: randomUUID(),
  dogId: post.dogId,
  eventType: "fb_post",
  timestamp,
  source: "facebook",
  summary: post.summary ?? "Featured in Facebook post",
  createdBy: SYSTEM_ACTOR,
  payload: { postUrl: post.postUrl, postDate: post.postDate, rescueName: post.rescueName },
})

/**
 * One event per detected change, in detection order. `dog` is the stored
 * version after the change, so first-seen events carry its base score.
 */
export const eventsFromChanges = (
  changes: ReadonlyArray<DogChange>,
  dog: Dog,
  timestamp: string
): ReadonlyArray<DogEvent> =>
  changes.map(
    DogChange.$match({
      FirstSeen: (): DogEvent => firstSeenEvent(dog, timestamp),
      StatusChanged: ({ oldValue, newValue }): DogEvent => statusChangeEvent(dog, oldValue, newValue, timestamp),
      FieldsUpdated: ({ changes }): DogEvent => websiteUpdateEvent(dog, changes, timestamp),
      ImagesAdded: ({ urls }): DogEvent => imageAddedEvent(dog, urls, timestamp),
    })
  )
