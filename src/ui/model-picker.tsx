import React from "react";
import { Box, Text, render, type Instance } from "ink";
import { createKeySource, type KeySource } from "./keys.js";
import { applyKeys, createSelectorState, visibleWindow, type SelectorState } from "./selector.js";
import type { Output } from "./render.js";

export interface PickerView {
  render(state: SelectorState): void;
  close(): void;
}

export interface PickerOutcome {
  selection?: string;
  cancelled: boolean;
}

export interface PickerOptions {
  source?: KeySource;
  view?: PickerView;
  title?: string;
  initial?: string;
  describe?: (item: string) => string;
}

interface SelectorViewProps {
  title: string;
  state: SelectorState;
  describe: (item: string) => string;
}

export function SelectorView({ title, state, describe }: SelectorViewProps) {
  const { start, end } = visibleWindow(state);
  const rows = state.filtered.slice(start, end);
  const total = state.items.length;

  return (
    <Box flexDirection="column">
      <Text color="cyan">{title}</Text>
      <Box marginTop={1}>
        <Text>
          Search: {state.searchTerm}
          <Text color="cyan">█</Text>
        </Text>
      </Box>
      <Text color="gray">
        {state.filtered.length === 0
          ? `0 matches (${total} total)`
          : `Showing ${start + 1}-${end} of ${state.filtered.length} matches (${total} total)`}
      </Text>
      <Box flexDirection="column" marginTop={1}>
        {rows.length === 0 ? (
          <Text color="yellow">No models match your search.</Text>
        ) : (
          rows.map((item, i) => {
            const active = start + i === state.cursor;
            return (
              <Text key={`${item}-${start + i}`} color={active ? "cyan" : undefined}>
                {active ? "> " : "  "}
                {describe(item)}
              </Text>
            );
          })
        )}
      </Box>
      <Box marginTop={1}>
        <Text color="gray">[↑↓] Move [Enter] Select [Esc] Cancel  Type to filter</Text>
      </Box>
    </Box>
  );
}

export function inkView(title: string, describe: (item: string) => string): PickerView {
  let app: Instance | undefined;
  return {
    render(state) {
      const screen = <SelectorView title={title} state={state} describe={describe} />;
      if (app) {
        app.rerender(screen);
      } else {
        app = render(screen, { exitOnCtrlC: false, patchConsole: false });
      }
    },
    close() {
      if (!app) return;
      app.clear();
      app.unmount();
      app = undefined;
    },
  };
}

// Used when stdin is not a terminal: the list is printed once, then lines are read as searches.
export function lineView(title: string, describe: (item: string) => string, out: Output = process.stderr): PickerView {
  let shown = false;
  return {
    render(state) {
      if (shown) {
        if (state.filtered.length === 0) out.write("No models match your search.\n");
        return;
      }
      shown = true;
      const lines = [title, ...state.filtered.map((item, i) => `  ${i + 1}) ${describe(item)}`)];
      lines.push("Type part of a model name and press Enter:");
      out.write(`${lines.join("\n")}\n`);
    },
    close() {},
  };
}

export async function runModelPicker(items: readonly string[], options: PickerOptions = {}): Promise<PickerOutcome> {
  const title = options.title ?? "Select a model";
  const describe = options.describe ?? ((item: string) => item);
  const source = options.source ?? createKeySource();
  const view = options.view ?? (source.interactive ? inkView(title, describe) : lineView(title, describe));

  // The line fallback always picks the first match of the typed search.
  let state = createSelectorState(items, source.interactive ? options.initial : undefined);
  try {
    view.render(state);
    while (state.status.kind === "browsing") {
      const keys = await source.readKeys();
      if (keys.length === 0) continue;
      state = applyKeys(state, keys);
      if (state.status.kind === "browsing") view.render(state);
    }
  } finally {
    view.close();
    source.close();
  }

  return state.status.kind === "selected" ? { selection: state.status.item, cancelled: false } : { cancelled: true };
}
