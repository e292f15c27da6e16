import { Schema } from "effect"

export const EventType = Schema.Literal(
  "first_seen",
  "status_change",
  "website_update",
  "fb_post",
  "admin_edit",
  "image_added"
)
export type EventType = typeof EventType.Type

export const FieldValue = Schema.Union(Schema.String, Schema.Number, Schema.Boolean, Schema.Null)
export type FieldValue = typeof FieldValue.Type

export const FieldDiff = Schema.Struct({
  field: Schema.String,
  oldValue: FieldValue,
  newValue: FieldValue,
})
export type FieldDiff = typeof FieldDiff.Type

const eventFields = {
  eventId: Schema.String,
  dogId: Schema.String,
  timestamp: Schema.String,
  source: Schema.String,
  summary: Schema.String,
  createdBy: Schema.String,
}

export const FirstSeenEvent = Schema.Struct({
  ...eventFields,
  eventType: Schema.Literal("first_seen"),
  payload: Schema.Struct({
    dogName: Schema.String,
    rescueName: Schema.NullOr(Schema.String),
    initialStatus: Schema.String,
    initialFitScore: Schema.NullOr(Schema.Number),
  }),
})
export type FirstSeenEvent = typeof FirstSeenEvent.Type

export const StatusChangeEvent = Schema.Struct({
  ...eventFields,
  eventType: Schema.Literal("status_change"),
  payload: Schema.Struct({
    dogName: Schema.String,
    fromStatus: Schema.String,
    toStatus: Schema.String,
  }),
})
export type StatusChangeEvent = typeof StatusChangeEvent.Type

export const WebsiteUpdateEvent = Schema.Struct({
  ...eventFields,
  eventType: Schema.Literal("website_update"),
  payload: Schema.Struct({
    dogName: Schema.String,
    changes: Schema.Array(FieldDiff),
  }),
})
export type WebsiteUpdateEvent = typeof WebsiteUpdateEvent.Type

export const ImageAddedEvent = Schema.Struct({
  ...eventFields,
  eventType: Schema.Literal("image_added"),
  payload: Schema.Struct({
    imageUrls: Schema.Array(Schema.String),
    imageSource: Schema.String,
  }),
})
export type ImageAddedEvent = typeof ImageAddedEvent.Type

export const AdminEditEvent = Schema.Struct({
  ...eventFields,
  eventType: Schema.Literal("admin_edit"),
  payload: Schema.Struct({
    field: Schema.String,
    oldValue: FieldValue,
    newValue: FieldValue,
    reason: Schema.String,
  }),
})
export type AdminEditEvent = typeof AdminEditEvent.Type

export const FbPostEvent = Schema.Struct({
  ...eventFields,
  eventType: Schema.Literal("fb_post"),
  payload: Schema.Struct({
    postUrl: Schema.String,
    postDate: Schema.String,
    rescueName: Schema.NullOr(Schema.String),
  }),
})
export type FbPostEvent = typeof FbPostEvent.Type

export const DogEvent = Schema.Union(
  FirstSeenEvent,
  StatusChangeEvent,
  WebsiteUpdateEvent,
  ImageAddedEvent,
  AdminEditEvent,
  FbPostEvent
)
export type DogEvent = typeof DogEvent.Type
