/* src/storage/index.ts */

export {
  FileTaskStore,
  KeyedSerialQueue,
  MemoryTaskStore,
  type TaskFilter,
  type TaskStore,
  type TaskStoreOptions,
} from "./task-store";
