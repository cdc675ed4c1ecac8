export interface User {
  id: number;
  createdAt: string;
  tzOffsetMin: number;
}

export interface Tasting {
  id: number;
  userId: number;
  seqNo: number;
  name: string;
  year: number | null;
  region: string | null;
  category: string | null;
  grams: number | null;
  tempC: number | null;
  tastedAt: string | null;
  gear: string | null;
  aromaDry: string | null;
  aromaWarmed: string | null;
  effectsCsv: string | null;
  scenariosCsv: string | null;
  rating: number;
  summary: string | null;
  createdAt: string;
}

export type TastingInput = Omit<Tasting, "id" | "seqNo" | "createdAt">;

export interface Infusion {
  id: number;
  tastingId: number;
  n: number;
  seconds: number | null;
  liquorColor: string | null;
  taste: string | null;
  specialNotes: string | null;
  body: string | null;
  aftertaste: string | null;
}

export type InfusionInput = Omit<Infusion, "id" | "tastingId">;

export interface UserState {
  userId: number;
  step: string;
  payload: string | null;
  updatedAt: string;
}

/** Columns the edit flow may write one at a time. */
export type EditableColumn =
  | "name"
  | "year"
  | "region"
  | "category"
  | "grams"
  | "temp_c"
  | "tasted_at"
  | "gear"
  | "aroma_dry"
  | "aroma_warmed"
  | "effects_csv"
  | "scenarios_csv"
  | "rating"
  | "summary";

export type SearchKind = "last" | "name" | "cat" | "year" | "rating";

export interface SearchPage {
  rows: Tasting[];
  hasMore: boolean;
}

export interface DailyStats {
  activeUsers: number;
  started: number;
  saved: number;
}
