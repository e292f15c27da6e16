import { sqliteTable, text, integer, real, index, primaryKey } from "drizzle-orm/sqlite-core"

// Structured columns hold JSON that is decoded through the domain schemas on read.

export const dogs = sqliteTable("dogs", {
  dogId: text("dog_id").primaryKey(),
  dogName: text("dog_name").notNull(),
  rescueName: text("rescue_name"),
  rescueDogUrl: text("rescue_dog_url"),
  platform: text("platform"),
  status: text("status").notNull().default("Unknown"),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  weightLbs: real("weight_lbs"),
  ageYears: real("age_years"),
  ageDisplay: text("age_display"),
  sex: text("sex"),
  breed: text("breed"),
  location: text("location"),
  goodWithDogs: text("good_with_dogs"),
  goodWithCats: text("good_with_cats"),
  goodWithKids: text("good_with_kids"),
  shedding: text("shedding"),
  energyLevel: text("energy_level"),
  specialNeeds: integer("special_needs", { mode: "boolean" }).notNull().default(false),
  specialNeedsNotes: text("special_needs_notes"),
  adoptionFee: text("adoption_fee"),
  primaryImageUrl: text("primary_image_url"),
  images: text("images", { mode: "json" }).$type<unknown>().notNull().default([]),
  rescueMeta: text("rescue_meta", { mode: "json" }).$type<unknown>().notNull().default({}),
  baseFitScore: real("base_fit_score"),
  createdAt: text("created_at"),
  updatedAt: text("updated_at"),
  statusChangedAt: text("status_changed_at"),
  lastScrapedAt: text("last_scraped_at"),
  legacyKeys: text("legacy_keys", { mode: "json" }).$type<unknown>(),
}, (table) => [
  index("dogs_rescue_name_idx").on(table.rescueName),
  index("dogs_is_active_idx").on(table.isActive),
  index("dogs_status_idx").on(table.status),
])

// Append-only. No foreign key to dogs: history outlives the dog row.
export const dogEvents = sqliteTable("dog_events", {
  seq: integer("seq").primaryKey({ autoIncrement: true }),
  eventId: text("event_id").notNull().unique(),
  dogId: text("dog_id").notNull(),
  eventType: text("event_type").notNull(),
  timestamp: text("timestamp").notNull(),
  source: text("source").notNull(),
  summary: text("summary").notNull(),
  createdBy: text("created_by").notNull(),
  payload: text("payload", { mode: "json" }).$type<unknown>().notNull(),
}, (table) => [
  index("dog_events_dog_id_idx").on(table.dogId, table.timestamp),
  index("dog_events_timestamp_idx").on(table.timestamp),
  index("dog_events_type_idx").on(table.eventType),
])

export const userDogStates = sqliteTable("user_dog_states", {
  userId: text("user_id").notNull(),
  dogId: text("dog_id").notNull(),
  overrides: text("overrides", { mode: "json" }).$type<unknown>().notNull().default({}),
  favorite: integer("favorite", { mode: "boolean" }).notNull().default(false),
  hidden: integer("hidden", { mode: "boolean" }).notNull().default(false),
  applied: integer("applied", { mode: "boolean" }).notNull().default(false),
  contactedRescue: integer("contacted_rescue", { mode: "boolean" }).notNull().default(false),
  notes: text("notes").notNull().default(""),
  computedFitScore: real("computed_fit_score"),
  createdAt: text("created_at"),
  updatedAt: text("updated_at"),
  favoritedAt: text("favorited_at"),
}, (table) => [
  primaryKey({ columns: [table.userId, table.dogId] }),
  index("user_dog_states_user_idx").on(table.userId),
])

export const userPreferences = sqliteTable("user_preferences", {
  userId: text("user_id").primaryKey(),
  scoringConfig: text("scoring_config", { mode: "json" }).$type<unknown>().notNull().default({}),
  defaultFilter: text("default_filter").notNull().default("available"),
  defaultSort: text("default_sort").notNull().default("fit-desc"),
  defaultRescue: text("default_rescue").notNull().default("all"),
  emailNotifications: integer("email_notifications", { mode: "boolean" }).notNull().default(false),
  notifyOnNewDogs: integer("notify_on_new_dogs", { mode: "boolean" }).notNull().default(true),
  notifyOnStatusChanges: integer("notify_on_status_changes", { mode: "boolean" }).notNull().default(true),
  notifyMinFitScore: real("notify_min_fit_score").notNull().default(5),
})
