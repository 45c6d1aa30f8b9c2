export type Task = () => void

/**
 * Runs tasks on some later turn. Tasks submitted to one executor run in
 * submission order.
 */
export interface Executor {
  execute(task: Task): void
}
