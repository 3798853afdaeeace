/** One to-do item */
export interface Entry {
    /** todo description - any text, including the empty string */
    description: string;
    /** tell if the todo item is completed */
    completed: boolean;
}

/** Possible filter values - the value is also the label displayed by the filter links */
export enum FilterMode {
    All = "All",
    Active = "Active",
    Completed = "Completed"
}

export interface TodoModel {
    /** list of all entries, in insertion order */
    entries: Entry[];
    /** current filter - only changes what the queries return */
    filter: FilterMode;
    /** text of the new entry input, not submitted yet */
    draft: string;
}

/**
 * Intents dispatched by the renderer
 * Indexes always refer to a position in the filtered view (cf. filteredEntries())
 */
export type TodoIntent =
    | { type: "Add" }
    | { type: "UpdateDraft", text: string }
    | { type: "Remove", index: number }
    | { type: "SetFilter", filter: FilterMode }
    | { type: "ToggleAll" }
    | { type: "Toggle", index: number }
    | { type: "ClearCompleted" }
    | { type: "NoOp" };

export type TodoIntentType = TodoIntent["type"];
