import { Effect } from "effect"
import type { LegacyFormatError, StorageError, ValidationError } from "../domain/errors.js"
import { overridesFromLegacy } from "../domain/legacy-overrides.js"
import { Dal } from "./dal.js"

export interface OverridesImportReport {
  readonly userId: string
  readonly states: number
  readonly scoringWeights: number
}

/**
 * Moves one user's old overrides file into storage. Imported overrides and the
 * favorite flag replace what is stored; notes and other flags are kept.
 * Imported weights are merged over the stored scoring config before any
 * state is saved.
 */
export const importLegacyOverrides = (
  userId: string,
  raw: unknown
): Effect.Effect<OverridesImportReport, LegacyFormatError | ValidationError | StorageError, Dal> =>
  Effect.gen(function* () {
    const dal = yield* Dal
    const imported = yield* overridesFromLegacy(userId, raw)

    const preferences = yield* dal.getUserPreferences(userId)
    yield* dal.saveUserPreferences({
      ...preferences,
      scoringConfig: { ...preferences.scoringConfig, ...imported.scoringConfig },
    })

    for (const state of imported.states) {
      const existing = yield* dal.getUserDogState(userId, state.dogId)
      yield* dal.saveUserDogState({ ...existing, overrides: state.overrides, favorite: state.favorite })
    }

    yield* Effect.logInfo(`Imported overrides for ${imported.states.length} dog(s) of ${userId}`)
    return {
      userId,
      states: imported.states.length,
      scoringWeights: Object.keys(imported.scoringConfig).length,
    }
  })
