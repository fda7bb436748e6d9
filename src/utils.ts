/**
 * Shared utility functions used across the codebase.
 */

/**
 * Converts a place name to the slug used for map file names.
 * Example: "Des Moines, Iowa, USA" -> "des-moines-iowa-usa"
 */
export function slugifyPlace(place: string): string {
  return place
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
}

/**
 * Formats a distance in meters, switching to km past 1000 m.
 * Example: 1534.2 -> "1.53 km", 87.4 -> "87 m"
 */
export function formatMeters(meters: number): string {
  if (Math.abs(meters) >= 1000) {
    return `${(meters / 1000).toFixed(2)} km`
  }
  return `${Math.round(meters)} m`
}

/**
 * Formats a battery/time amount in seconds as hours and minutes.
 * Negative values keep their sign. Example: 3725 -> "1h 02m"
 */
export function formatDuration(seconds: number): string {
  const sign = seconds < 0 ? "-" : ""
  const totalMinutes = Math.floor(Math.abs(seconds) / 60)
  const hours = Math.floor(totalMinutes / 60)
  const minutes = totalMinutes % 60
  return `${sign}${hours}h ${String(minutes).padStart(2, "0")}m`
}
