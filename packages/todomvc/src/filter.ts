import { Entry, FilterMode } from "./types";

/** Filter modes in display order */
export const FILTER_MODES: readonly FilterMode[] = [FilterMode.All, FilterMode.Active, FilterMode.Completed];

/**
 * Tell if an entry should be displayed for a given filter mode
 */
export function fit(mode: FilterMode, entry: Entry): boolean {
    switch (mode) {
        case FilterMode.Active:
            return !entry.completed;
        case FilterMode.Completed:
            return entry.completed;
        default:
            return true;
    }
}

export function filterLabel(mode: FilterMode): string {
    return mode;
}
