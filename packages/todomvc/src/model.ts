import { IndexError } from "./errors";
import { fit } from "./filter";
import { Entry, FilterMode, TodoIntent, TodoModel } from "./types";

/** Filtered view item: position in the filtered view + entry */
export type FilteredEntry = [index: number, entry: Entry];

export interface TodoModelInit {
    entries?: Entry[];
    filter?: FilterMode;
    draft?: string;
}

/**
 * Create a new model - init entries are copied so that the caller's objects are never mutated
 */
export function createModel(init: TodoModelInit = {}): TodoModel {
    return {
        entries: (init.entries || []).map(({ description, completed }) => ({ description, completed })),
        filter: init.filter || FilterMode.All,
        draft: init.draft || ""
    };
}

export function total(model: TodoModel): number {
    return model.entries.length;
}

export function totalActive(model: TodoModel): number {
    return model.entries.filter((e) => fit(FilterMode.Active, e)).length;
}

export function totalCompleted(model: TodoModel): number {
    return model.entries.filter((e) => fit(FilterMode.Completed, e)).length;
}

/**
 * Tell if all the entries of the filtered view are completed
 * Return false if the filtered view is empty
 */
export function isAllCompleted(model: TodoModel): boolean {
    const entries = visibleEntries(model);
    return entries.length > 0 && entries.every((e) => e.completed);
}

/**
 * Return the filtered view, with the position of each entry in this view
 */
export function filteredEntries(model: TodoModel): FilteredEntry[] {
    return visibleEntries(model).map((entry, index): FilteredEntry => [index, entry]);
}

function visibleEntries(model: TodoModel): Entry[] {
    const filter = model.filter;
    return model.entries.filter((e) => fit(filter, e));
}

/** Resolve a filtered view index into the underlying entry */
function getVisibleEntry(model: TodoModel, index: number): Entry {
    const entries = visibleEntries(model);
    if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
        throw new IndexError(index, entries.length);
    }
    return entries[index];
}

/**
 * Map a key pressed in the new entry input to an intent
 */
export function parseIntentKey(key: string): TodoIntent {
    return key === "Enter" ? { type: "Add" } : { type: "NoOp" };
}

/**
 * Apply an intent to the model (the model is mutated)
 * @throws IndexError if a Remove or Toggle index is outside the filtered view
 */
export function update(model: TodoModel, intent: TodoIntent): void {
    switch (intent.type) {
        case "Add":
            model.entries.push({ description: model.draft, completed: false });
            model.draft = "";
            break;
        case "UpdateDraft":
            model.draft = intent.text;
            break;
        case "Remove": {
            const entry = getVisibleEntry(model, intent.index);
            model.entries.splice(model.entries.indexOf(entry), 1);
            break;
        }
        case "SetFilter":
            model.filter = intent.filter;
            break;
        case "ToggleAll": {
            const completed = !isAllCompleted(model);
            for (const entry of visibleEntries(model)) {
                entry.completed = completed;
            }
            break;
        }
        case "Toggle": {
            const entry = getVisibleEntry(model, intent.index);
            entry.completed = !entry.completed;
            break;
        }
        case "ClearCompleted":
            if (totalCompleted(model) > 0) {
                // keep the same array reference (observers hold it)
                const active = model.entries.filter((e) => fit(FilterMode.Active, e));
                model.entries.splice(0, model.entries.length, ...active);
            }
            break;
        case "NoOp":
            break;
    }
}
