import { FILTER_MODES, filterLabel } from "./filter";
import { filteredEntries, isAllCompleted, totalActive, totalCompleted } from "./model";
import { FilterMode, TodoModel } from "./types";

export interface TodoRowView {
    /** position in the filtered view - to use in Remove / Toggle intents */
    index: number;
    description: string;
    completed: boolean;
}

export interface TodoFilterView {
    mode: FilterMode;
    label: string;
    selected: boolean;
}

export interface TodoView {
    rows: TodoRowView[];
    toggleAllChecked: boolean;
    itemsLeftLabel: string;
    clearCompletedLabel: string;
    filters: TodoFilterView[];
}

/**
 * Derive the data displayed by a TodoMVC page from the current model
 */
export function createTodoView(model: TodoModel): TodoView {
    return {
        rows: filteredEntries(model).map(([index, { description, completed }]) => ({ index, description, completed })),
        toggleAllChecked: isAllCompleted(model),
        itemsLeftLabel: `${totalActive(model)} item(s) left`,
        clearCompletedLabel: `Clear completed (${totalCompleted(model)})`,
        filters: FILTER_MODES.map((mode) => ({ mode, label: filterLabel(mode), selected: mode === model.filter }))
    };
}
