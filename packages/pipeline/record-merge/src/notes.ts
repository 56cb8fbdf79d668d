const ENTRY_SEPARATOR = "\n\n"

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatNoteTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

export function formatNoteEntry(text: string, at: Date): string {
  return `[${formatNoteTimestamp(at)}]\n${text}`
}

export function appendNoteEntry(current: string | null | undefined, text: string, at: Date): string {
  const entry = formatNoteEntry(text, at)
  return current ? `${current}${ENTRY_SEPARATOR}${entry}` : entry
}
