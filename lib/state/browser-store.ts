"use client";

import { create } from "zustand";
import type { ColumnKey } from "@/lib/domain/types";
import type { PageSize } from "@/lib/config";
import { DEFAULT_QUERY, parseTeamFilter, type QueryConfig } from "@/lib/query/pipeline";

type State = {
  position: string;
  nameQuery: string;
  teamsInput: string; // raw comma-separated text as typed
  sortField: ColumnKey;
  sortDescending: boolean;
  pageSize: PageSize;
  pageIndex: number;
  compareSelection: string[];
  setPosition: (position: string) => void;
  setNameQuery: (q: string) => void;
  setTeamsInput: (input: string) => void;
  setSort: (field: ColumnKey, descending?: boolean) => void;
  setPageSize: (size: PageSize) => void;
  setPageIndex: (page: number) => void;
  toggleCompare: (name: string) => void;
  setCompareSelection: (names: string[]) => void;
  reset: () => void;
};

type Controls = Omit<State, `set${string}` | "toggleCompare" | "reset">;

function initialState(): Controls {
  return {
    position: DEFAULT_QUERY.position,
    nameQuery: DEFAULT_QUERY.nameQuery,
    teamsInput: "",
    sortField: DEFAULT_QUERY.sortField,
    sortDescending: DEFAULT_QUERY.sortDescending,
    pageSize: DEFAULT_QUERY.pageSize,
    pageIndex: 1,
    compareSelection: [],
  };
}

// Any change to what is shown sends the user back to page 1
export const useBrowserStore = create<State>((set, get) => ({
  ...initialState(),
  setPosition: (position) => set({ position, pageIndex: 1 }),
  setNameQuery: (nameQuery) => set({ nameQuery, pageIndex: 1 }),
  setTeamsInput: (teamsInput) => set({ teamsInput, pageIndex: 1 }),
  setSort: (sortField, descending) =>
    set({ sortField, sortDescending: descending ?? get().sortDescending, pageIndex: 1 }),
  setPageSize: (pageSize) => set({ pageSize, pageIndex: 1 }),
  setPageIndex: (page) => set({ pageIndex: Math.max(1, Math.trunc(page)) }),
  toggleCompare: (name) => {
    const cur = get().compareSelection;
    // no cap here: the ranker truncates and warns
    set({ compareSelection: cur.includes(name) ? cur.filter((n) => n !== name) : [...cur, name] });
  },
  setCompareSelection: (names) => set({ compareSelection: [...names] }),
  reset: () => set(initialState()),
}));

export function selectQueryConfig(s: State): QueryConfig {
  return {
    position: s.position,
    nameQuery: s.nameQuery,
    teams: parseTeamFilter(s.teamsInput),
    sortField: s.sortField,
    sortDescending: s.sortDescending,
    pageSize: s.pageSize,
    pageIndex: s.pageIndex,
  };
}
