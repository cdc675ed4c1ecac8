import { z } from "zod";
import { AppDatabase } from "../db.js";
import { TEXT_FIELD_KEYS } from "./editFields.js";

// Each wizard step carries only what was collected before it.
const nameDraft = z.object({ name: z.string() });
const yearDraft = nameDraft.extend({ year: z.number().int().nullable() });
const regionDraft = yearDraft.extend({ region: z.string().nullable() });
const categoryDraft = regionDraft.extend({ category: z.string().nullable() });
const gramsDraft = categoryDraft.extend({ grams: z.number().nullable() });
const tempDraft = gramsDraft.extend({ tempC: z.number().int().nullable() });
const timeDraft = tempDraft.extend({ tastedAt: z.string().nullable() });
const gearDraft = timeDraft.extend({ gear: z.string().nullable() });
const aromaDryDraft = gearDraft.extend({ aromaDry: z.string().nullable() });
const aromaDraft = aromaDryDraft.extend({ aromaWarmed: z.string().nullable() });

const infusionSeconds = z.object({ seconds: z.number().int().nullable() });
const infusionColor = infusionSeconds.extend({ liquorColor: z.string().nullable() });
const infusionTaste = infusionColor.extend({ taste: z.string().nullable() });
const infusionSpecial = infusionTaste.extend({ specialNotes: z.string().nullable() });
const infusionBody = infusionSpecial.extend({ body: z.string().nullable() });
const infusionRecord = infusionBody.extend({
  n: z.number().int().min(1),
  aftertaste: z.string().nullable()
});

const infusedDraft = aromaDraft.extend({ infusions: z.array(infusionRecord) });
const effectsDraft = infusedDraft.extend({ effects: z.array(z.string()) });
const scenariosDraft = effectsDraft.extend({ scenarios: z.array(z.string()) });
const ratedDraft = scenariosDraft.extend({ rating: z.number().int().min(0).max(10) });
const summaryDraft = ratedDraft.extend({ summary: z.string().nullable() });

const picker = z.object({
  selected: z.array(z.string()),
  awaitingCustom: z.boolean()
});

const wizardStateSchema = z.discriminatedUnion("step", [
  z.object({ step: z.literal("name") }),
  z.object({ step: z.literal("year"), draft: nameDraft }),
  z.object({ step: z.literal("region"), draft: yearDraft }),
  z.object({ step: z.literal("category"), draft: regionDraft, awaitingCustom: z.boolean() }),
  z.object({ step: z.literal("grams"), draft: categoryDraft }),
  z.object({ step: z.literal("temp"), draft: gramsDraft }),
  z.object({ step: z.literal("tasted_at"), draft: tempDraft }),
  z.object({ step: z.literal("gear"), draft: timeDraft }),
  z.object({ step: z.literal("aroma_dry"), draft: gearDraft, picker }),
  z.object({ step: z.literal("aroma_warmed"), draft: aromaDryDraft, picker }),
  z.object({ step: z.literal("inf_seconds"), draft: infusedDraft }),
  z.object({ step: z.literal("inf_color"), draft: infusedDraft, current: infusionSeconds }),
  z.object({ step: z.literal("inf_taste"), draft: infusedDraft, current: infusionColor, picker }),
  z.object({ step: z.literal("inf_special"), draft: infusedDraft, current: infusionTaste }),
  z.object({
    step: z.literal("inf_body"),
    draft: infusedDraft,
    current: infusionSpecial,
    awaitingCustom: z.boolean()
  }),
  z.object({ step: z.literal("inf_aftertaste"), draft: infusedDraft, current: infusionBody, picker }),
  z.object({ step: z.literal("inf_more"), draft: infusedDraft }),
  z.object({ step: z.literal("effects"), draft: infusedDraft, picker }),
  z.object({ step: z.literal("scenarios"), draft: effectsDraft, picker }),
  z.object({ step: z.literal("rating"), draft: scenariosDraft }),
  z.object({ step: z.literal("summary"), draft: ratedDraft }),
  z.object({ step: z.literal("photos"), draft: summaryDraft, photos: z.array(z.string()) })
]);

const editModeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("choosing") }),
  z.object({ type: z.literal("text"), field: z.enum(TEXT_FIELD_KEYS) }),
  z.object({ type: z.literal("category") }),
  z.object({ type: z.literal("category_text") }),
  z.object({ type: z.literal("rating") })
]);

const sessionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("wizard"), wizard: wizardStateSchema }),
  z.object({ kind: z.literal("search"), awaiting: z.enum(["name", "category", "year"]) }),
  z.object({
    kind: z.literal("edit"),
    tastingId: z.number().int(),
    seqNo: z.number().int(),
    mode: editModeSchema
  }),
  z.object({ kind: z.literal("edit_lost") })
]);

export type WizardState = z.infer<typeof wizardStateSchema>;
export type WizardStep = WizardState["step"];
export type WizardAt<S extends WizardStep> = Extract<WizardState, { step: S }>;
export type PickerState = z.infer<typeof picker>;
export type InfusedDraft = z.infer<typeof infusedDraft>;
export type SummaryDraft = z.infer<typeof summaryDraft>;
export type InfusionRecord = z.infer<typeof infusionRecord>;
export type Session = z.infer<typeof sessionSchema>;
export type SessionKind = Session["kind"];
export type SessionOf<K extends SessionKind> = Extract<Session, { kind: K }>;

export const emptyPicker = (): PickerState => ({ selected: [], awaitingCustom: false });

/** Conversation state per user, persisted in user_states. */
export class SessionStore {
  constructor(private readonly db: AppDatabase) {}

  load(userId: number): Session | null {
    const state = this.db.getUserState(userId);
    if (!state?.payload) {
      return null;
    }

    return parseSession(state.payload);
  }

  save(userId: number, session: Session): void {
    this.db.setUserState(userId, describeStep(session), JSON.stringify(session));
  }

  clear(userId: number): void {
    this.db.clearUserState(userId);
  }
}

export function parseSession(payload: string): Session | null {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return null;
  }

  const parsed = sessionSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function describeStep(session: Session): string {
  switch (session.kind) {
    case "wizard":
      return `wizard:${session.wizard.step}`;
    case "search":
      return `search:${session.awaiting}`;
    case "edit":
      return `edit:${session.mode.type}`;
    case "edit_lost":
      return "edit_lost";
  }
}
