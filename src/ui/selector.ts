import type { Key } from "./keys.js";

export const WINDOW_SIZE = 10;
export const LOOK_BEHIND = 5;

export type SelectorStatus =
  | { kind: "browsing" }
  | { kind: "selected"; item: string }
  | { kind: "cancelled" };

export interface SelectorState {
  readonly items: readonly string[];
  readonly searchTerm: string;
  readonly filtered: readonly string[];
  readonly cursor: number;
  readonly status: SelectorStatus;
}

const BROWSING: SelectorStatus = { kind: "browsing" };

export function filterItems(items: readonly string[], searchTerm: string): string[] {
  if (!searchTerm) return [...items];
  const needle = searchTerm.toLowerCase();
  return items.filter((item) => item.toLowerCase().includes(needle));
}

export function clampCursor(cursor: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(Math.max(cursor, 0), length - 1);
}

export function applySearch(state: SelectorState, searchTerm: string): SelectorState {
  const filtered = filterItems(state.items, searchTerm);
  return { ...state, searchTerm, filtered, cursor: clampCursor(state.cursor, filtered.length) };
}

export function createSelectorState(items: readonly string[], initial?: string): SelectorState {
  const start = initial === undefined ? -1 : items.indexOf(initial);
  return {
    items,
    searchTerm: "",
    filtered: [...items],
    cursor: start >= 0 ? start : 0,
    status: BROWSING,
  };
}

export function transition(state: SelectorState, key: Key): SelectorState {
  if (state.status.kind !== "browsing") return state;

  switch (key.kind) {
    case "printable":
      return applySearch(state, state.searchTerm + key.char);
    case "backspace":
      if (!state.searchTerm) return state;
      return applySearch(state, Array.from(state.searchTerm).slice(0, -1).join(""));
    case "arrow": {
      if (state.filtered.length === 0) return state;
      if (key.direction === "up") return { ...state, cursor: clampCursor(state.cursor - 1, state.filtered.length) };
      if (key.direction === "down") return { ...state, cursor: clampCursor(state.cursor + 1, state.filtered.length) };
      return state;
    }
    case "enter": {
      const item = state.filtered[state.cursor];
      if (state.filtered.length === 0 || item === undefined) return state;
      return { ...state, status: { kind: "selected", item } };
    }
    case "escape":
    case "interrupt":
      return { ...state, status: { kind: "cancelled" } };
  }
}

export function applyKeys(state: SelectorState, keys: readonly Key[]): SelectorState {
  let next = state;
  for (const key of keys) {
    next = transition(next, key);
    if (next.status.kind !== "browsing") break;
  }
  return next;
}

// Rows [start, end) of `filtered` to draw; always contains the cursor.
export function visibleWindow(state: Pick<SelectorState, "filtered" | "cursor">): { start: number; end: number } {
  const total = state.filtered.length;
  const start = Math.max(0, Math.min(state.cursor - LOOK_BEHIND, total - WINDOW_SIZE));
  return { start, end: Math.min(total, start + WINDOW_SIZE) };
}
