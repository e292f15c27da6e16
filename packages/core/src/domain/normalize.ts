import type { Compatibility, DogStatus, EnergyLevel, Shedding } from "./dog.js"

// Scrapers run these once while building a record; stored dogs are never re-parsed.

export const normalizeStatus = (text: string | null | undefined): DogStatus => {
  const value = text?.toLowerCase().trim()
  if (!value) return "Unknown"

  if (value === "available" || value === "adoptable") return "Available"
  if (value === "coming soon" || value === "upcoming" || value === "coming_soon") return "Upcoming"
  if (value === "pending" || value === "adoption pending") return "Pending"
  if (value === "adopted" || value === "adopted/removed" || value === "removed") return "Adopted"
  if (value === "inactive") return "Inactive"
  return "Unknown"
}

export const normalizeCompatibility = (text: string | null | undefined): Compatibility => {
  const value = text?.toLowerCase().trim()
  if (!value) return "Unknown"
  if (/^(yes|y|true|good)\b/.test(value)) return "Yes"
  if (/^(no|n|false|not)\b/.test(value)) return "No"
  return "Unknown"
}

export const normalizeShedding = (text: string | null | undefined): Shedding => {
  const value = text?.toLowerCase() ?? ""
  if (/\b(none|non-shedding|no shedding|hypoallergenic)\b/.test(value)) return "None"
  if (/\b(low|minimal|light)\b/.test(value)) return "Low"
  if (/\b(moderate|medium|some)\b/.test(value)) return "Moderate"
  if (/\b(high|heavy)\b/.test(value)) return "High"
  return "Unknown"
}

export const normalizeEnergyLevel = (text: string | null | undefined): EnergyLevel => {
  const value = text?.toLowerCase() ?? ""
  if (/\b(low|calm|couch)\b/.test(value)) return "Low"
  if (/\b(medium|moderate)\b/.test(value)) return "Medium"
  if (/\b(high|very active)\b/.test(value)) return "High"
  return "Unknown"
}

/**
 * "About 50 lbs" -> 50, "45-50 pounds" -> 45
 */
export const parseWeightLbs = (text: string | null | undefined): number | null => {
  if (!text) return null
  const match = /~?\s*(\d+)\s*(?:-\s*\d+\s*)?(?:lbs?|pounds?)/.exec(text.toLowerCase())
  return match?.[1] ? parseInt(match[1], 10) : null
}

const toYears = (value: number, unit: string): number => {
  if (unit.startsWith("mo")) return value / 12
  if (unit.startsWith("wk") || unit.startsWith("week")) return value / 52
  return value
}

/**
 * "1-3 yrs" -> 2, "8 mos" -> 0.67. Ranges resolve to their midpoint.
 */
export const parseAgeYears = (text: string | null | undefined): number | null => {
  if (!text) return null
  const value = text.toLowerCase().replace(/[–—]/g, "-")

  const range = /(\d+\.?\d*)\s*-\s*(\d+\.?\d*)\s*(yr|year|mo|month)/.exec(value)
  if (range?.[1] && range[2] && range[3]) {
    const min = toYears(parseFloat(range[1]), range[3])
    const max = toYears(parseFloat(range[2]), range[3])
    return (min + max) / 2
  }

  const single = /(\d+\.?\d*)\s*(yr|year|mo|month|wk|week)/.exec(value)
  if (single?.[1] && single[2]) {
    return toYears(parseFloat(single[1]), single[2])
  }

  return null
}
