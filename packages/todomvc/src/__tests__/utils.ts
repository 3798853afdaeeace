import { Entry } from "../types";

/** Print entries as "1. description ✅" lines (the check mark is shown for completed entries) */
export function printEntries(entries: Entry[]): string[] {
    return entries.map((e, index) => {
        if (e === undefined) return "UNDEFINED";
        return `${index + 1}. ${e.description}${e.completed ? " ✅" : ""}`;
    });
}

export function entry(description: string, completed = false): Entry {
    return { description, completed };
}
