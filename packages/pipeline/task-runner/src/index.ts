export { startTask, pollTask, DEFAULT_POLL_INTERVAL_MS } from "./task-runner"
export type { TaskHandle, TaskOutcome, PollOptions } from "./task-runner"
