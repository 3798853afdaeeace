import { Store, trax } from "@traxjs/trax";
import { fit } from "./filter";
import {
    createModel,
    filteredEntries,
    isAllCompleted,
    TodoModelInit,
    total,
    totalActive,
    totalCompleted,
    update
} from "./model";
import { Entry, FilterMode, TodoIntent, TodoModel } from "./types";

export interface TodoStoreData extends TodoModel {
    /** entries matching the current filter (computed) */
    filteredEntries: Entry[];
    /** number of entries that remain to be completed (computed) */
    itemsLeft: number;
    /** number of entries that have been completed (computed) */
    nbrOfCompletedEntries: number;
}

export interface TodoStoreOptions extends TodoModelInit {
    /** trax store id (default: "TodoStore") */
    id?: string;
}

/** Event raised in the trax logs each time an intent is applied */
export const LOG_TODO_STORE_INTENT = "@todomvc/store:Intent";

export type TodoStore = ReturnType<typeof createTodoStore>;

/**
 * Create a trax store holding a todo list model
 * Actions throwing an error (e.g. IndexError) are caught by trax and logged in trax.log
 * @returns a store wrapper on Store<TodoStoreData>
 */
export function createTodoStore(options: TodoStoreOptions = {}) {
    const { id = "TodoStore", ...init } = options;
    return trax.createStore(id, (store: Store<TodoStoreData>) => {
        const data = store.init({
            ...createModel(init),
            filteredEntries: [],
            itemsLeft: 0,
            nbrOfCompletedEntries: 0
        });

        store.compute("FilteredEntries", () => {
            const filter = data.filter;
            trax.updateArray(data.filteredEntries, data.entries.filter((e) => fit(filter, e)));
        });

        store.compute("Counters", () => {
            data.itemsLeft = totalActive(data);
            data.nbrOfCompletedEntries = totalCompleted(data);
        });

        function dispatch(intent: TodoIntent) {
            trax.log.event(LOG_TODO_STORE_INTENT, { src: store.id, type: intent.type });
            if (intent.type === "UpdateDraft") {
                trax.log.info(`Input: ${intent.text}`);
            }
            update(data, intent);
        }

        return {
            /** Todo store data */
            data,
            /** Apply any intent */
            dispatch,
            /** Create a new entry from the draft value */
            add() {
                dispatch({ type: "Add" });
            },
            /** Update the new entry draft */
            updateDraft(text: string) {
                dispatch({ type: "UpdateDraft", text });
            },
            /** Remove the entry displayed at a given position of the filtered view */
            remove(index: number) {
                dispatch({ type: "Remove", index });
            },
            setFilter(filter: FilterMode) {
                dispatch({ type: "SetFilter", filter });
            },
            /** Complete all filtered entries - or un-complete them if they are all completed */
            toggleAll() {
                dispatch({ type: "ToggleAll" });
            },
            /** Toggle the completion of the entry displayed at a given position of the filtered view */
            toggle(index: number) {
                dispatch({ type: "Toggle", index });
            },
            clearCompleted() {
                dispatch({ type: "ClearCompleted" });
            },
            total() {
                return total(data);
            },
            totalActive() {
                return totalActive(data);
            },
            totalCompleted() {
                return totalCompleted(data);
            },
            isAllCompleted() {
                return isAllCompleted(data);
            },
            filteredEntries() {
                return filteredEntries(data);
            }
        }
    });
}
