export type TaskHandle = ReturnType<typeof setTimeout>;

export interface Scheduler {
  schedule(delayMs: number, task: () => void): TaskHandle;
  cancel(handle: TaskHandle): void;
}

// Looks the timer functions up on every call so fake timers installed
// after import still take effect.
export const timerScheduler: Scheduler = {
  schedule(delayMs, task) {
    return setTimeout(task, delayMs);
  },
  cancel(handle) {
    clearTimeout(handle);
  },
};
