import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TestDatabase, infusionInput, tastingInput } from "../testing/harness.js";
import { TastingCreateError, createTasting } from "./tastings.js";

describe("createTasting", () => {
  let db: TestDatabase;

  beforeEach(() => {
    db = new TestDatabase();
    db.ensureUser(7);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  it("persists the tasting with its infusions and photos", () => {
    const tasting = createTasting(db, tastingInput(7), [infusionInput(1)], ["photo-a"]);

    expect(tasting.seqNo).toBe(1);
    expect(db.countInfusions(tasting.id)).toBe(1);
    expect(db.listPhotoIds(tasting.id, 3)).toEqual(["photo-a"]);
  });

  it("retries once after a sequence number collision", () => {
    createTasting(db, tastingInput(7), [], []);
    vi.spyOn(db, "nextSeqNo").mockReturnValueOnce(1);

    const tasting = createTasting(db, tastingInput(7), [infusionInput(1)], []);

    expect(tasting.seqNo).toBe(2);
    expect(db.countTastings(7)).toBe(2);
    expect(db.countInfusions(tasting.id)).toBe(1);
  });

  it("gives up after the second collision and leaves no partial rows", () => {
    createTasting(db, tastingInput(7), [], []);
    vi.spyOn(db, "nextSeqNo").mockReturnValue(1);

    expect(() => createTasting(db, tastingInput(7), [infusionInput(1)], ["photo-b"])).toThrow(TastingCreateError);
    expect(db.countTastings(7)).toBe(1);
  });

  it("rejects more than three photos", () => {
    expect(() => createTasting(db, tastingInput(7), [], ["a", "b", "c", "d"])).toThrow(RangeError);
    expect(db.countTastings(7)).toBe(0);
  });
});
