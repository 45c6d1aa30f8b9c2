export { ImmediateExecutor } from "./adapters/executors/immediate-executor"
export { ManualExecutor } from "./adapters/executors/manual-executor"
export { MicrotaskExecutor } from "./adapters/executors/microtask-executor"
export {
  MemoryRecordStore,
  type MemoryRecordStoreOptions,
} from "./adapters/memory/memory-record-store"
export {
  type CreateTableDaoOptions,
  createTableDao,
  type TableDaoServices,
} from "./composition/create-table-dao"
export { loadDaoConfig, mapEnvToConfig } from "./config/load-dao-config"
export { type DaoConfig, type DaoEnv, type DaoEnvInput, daoEnvSchema } from "./config/schema"
export { AsyncDao, type AsyncDaoDeps } from "./core/async-dao"
export {
  CachingDao,
  type CachingDaoDeps,
  type CachingDaoOptions,
  QUERY_ALL,
} from "./core/caching-dao"
export { DaoError, type DaoErrorCode } from "./core/dao-error"
export { DefaultTableNameResolver } from "./core/default-table-name-resolver"
export { type DefineRecordTypeOptions, defineRecordType } from "./core/define-record-type"
export { DeliveryQueue, type DeliveryQueueDeps } from "./core/delivery-queue"
export { SubscriptionGroup } from "./core/subscription-group"
export type {
  AsyncCallback,
  AsyncFailure,
  AsyncOutcome,
  AsyncRun,
  AsyncRunState,
  AsyncSuccess,
} from "./ports/async-outcome"
export type { Executor, Task } from "./ports/executor"
export type { RecordStore } from "./ports/record-store"
export type { RecordType, RecordTypeIdentity } from "./ports/record-type"
export type { Subscription } from "./ports/subscription"
export type { TableDao } from "./ports/table-dao"
export type { TableNameResolver } from "./ports/table-name-resolver"
