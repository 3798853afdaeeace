export { FilterMode } from "./types";
export type { Entry, TodoIntent, TodoIntentType, TodoModel } from "./types";
export { IndexError } from "./errors";
export { FILTER_MODES, filterLabel, fit } from "./filter";
export {
    createModel,
    filteredEntries,
    isAllCompleted,
    parseIntentKey,
    total,
    totalActive,
    totalCompleted,
    update
} from "./model";
export type { FilteredEntry, TodoModelInit } from "./model";
export { createTodoStore, LOG_TODO_STORE_INTENT } from "./todostore";
export type { TodoStore, TodoStoreData, TodoStoreOptions } from "./todostore";
export { createTodoView } from "./viewmodel";
export type { TodoFilterView, TodoRowView, TodoView } from "./viewmodel";
