export type CliCommand =
  | { type: "quit" }
  | { type: "notes" }
  | { type: "new" }
  | { type: "audio"; path: string }
  | { type: "ask"; question: string }

export const PROGRESS_MESSAGE = "Consulting the AI engine... please wait. This may take a number of minutes!"

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"]

export function progressFrame(tick: number): string {
  return `${SPINNER_FRAMES[tick % SPINNER_FRAMES.length]} ${PROGRESS_MESSAGE}`
}

export function parseCommand(line: string): CliCommand {
  const trimmed = line.trim()
  if (trimmed === ":quit" || trimmed === ":exit") return { type: "quit" }
  if (trimmed === ":notes") return { type: "notes" }
  if (trimmed === ":new") return { type: "new" }
  if (trimmed.startsWith(":audio")) {
    return { type: "audio", path: trimmed.slice(":audio".length).trim() }
  }
  return { type: "ask", question: line }
}

/**
 * Multi-line input ends at a line holding a single ".".
 */
export function isEndOfInput(line: string): boolean {
  return line.trim() === "."
}
