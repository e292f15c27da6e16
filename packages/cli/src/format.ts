import type { DogEvent, IngestReport, PersonalizedDog } from "@pawtrail/core"

const score = (value: number): string => (value > 0 ? `+${value}` : String(value)).padStart(4)

export const formatDogLine = ({ dog, state, fitScore }: PersonalizedDog): string => {
  const marks = `${state.favorite ? "*" : " "}${state.hidden ? "h" : " "}`
  const rescue = dog.rescueName ?? "?"
  return `${score(fitScore)} ${marks} ${dog.dogName.padEnd(16)} ${dog.status.padEnd(10)} ${rescue}`
}

export const formatEventLine = (event: DogEvent): string =>
  `${event.timestamp}  ${event.dogId.padEnd(28)} ${event.eventType.padEnd(15)} ${event.summary}`

export const formatIngestReport = (report: IngestReport): ReadonlyArray<string> => [
  `${report.rescueName}: ${report.seen} seen`,
  `  added:       ${report.added}`,
  `  updated:     ${report.updated}`,
  `  unchanged:   ${report.unchanged}`,
  `  deactivated: ${report.deactivated}`,
  `  events:      ${report.events.length}`,
  ...report.errors.map((failure) => `  ! record ${failure.index} (${failure.dogId ?? "no id"}): ${failure.error.message}`),
]
