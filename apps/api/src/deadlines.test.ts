import { describe, expect, it } from "vitest";
import type { DeadlineWindow } from "@bursary/shared";
import { daysRemaining, describeDeadline, isDeadlineOpen } from "./deadlines";
import { DAY_MS, FIXED_NOW, InMemoryDeadlineStore, rejectionOf } from "./memory-store.test-helpers";
import { NotFoundError } from "./errors";

function window(overrides: Partial<DeadlineWindow> = {}): DeadlineWindow {
  return {
    id: 1,
    name: "2026 intake",
    startDate: new Date("2026-03-01T00:00:00.000Z"),
    endDate: new Date("2026-03-15T23:59:59.000Z"),
    isActive: true,
    createdAt: new Date("2026-02-20T00:00:00.000Z"),
    updatedAt: new Date("2026-02-20T00:00:00.000Z"),
    ...overrides,
  };
}

describe("deadline window", () => {
  it("is open between its bounds inclusive", () => {
    const deadline = window();
    expect(isDeadlineOpen(deadline, deadline.startDate)).toBe(true);
    expect(isDeadlineOpen(deadline, deadline.endDate)).toBe(true);
    expect(isDeadlineOpen(deadline, new Date(deadline.endDate.getTime() + 1))).toBe(false);
    expect(isDeadlineOpen(window({ isActive: false }), FIXED_NOW)).toBe(false);
  });

  it("counts whole days remaining and zero once closed", () => {
    expect(daysRemaining(window(), FIXED_NOW)).toBe(5);
    expect(daysRemaining(window(), new Date(FIXED_NOW.getTime() + 10 * DAY_MS))).toBe(0);
  });

  it("describes the public status", () => {
    expect(describeDeadline(window(), FIXED_NOW)).toEqual({
      isOpen: true,
      name: "2026 intake",
      startDate: "2026-03-01T00:00:00.000Z",
      endDate: "2026-03-15T23:59:59.000Z",
      daysRemaining: 5,
    });
    expect(describeDeadline(null, FIXED_NOW)).toEqual({ isOpen: false, message: "No active application deadline" });
  });
});

describe("deadline store", () => {
  it("keeps at most one window active", async () => {
    const store = new InMemoryDeadlineStore();
    const first = await store.create(
      { name: "First", startDate: window().startDate, endDate: window().endDate, isActive: true },
      FIXED_NOW
    );
    const second = await store.create(
      { name: "Second", startDate: window().startDate, endDate: window().endDate, isActive: true },
      FIXED_NOW
    );

    expect((await store.getActive())?.id).toBe(second.id);
    await store.activate(first.id, FIXED_NOW);
    expect((await store.list()).filter((w) => w.isActive).map((w) => w.name)).toEqual(["First"]);
  });

  it("reports an unknown window", async () => {
    const error = await rejectionOf(new InMemoryDeadlineStore().deactivate(99, FIXED_NOW));
    expect(error).toBeInstanceOf(NotFoundError);
    if (!(error instanceof NotFoundError)) return;
    expect(error.code).toBe("DEADLINE_NOT_FOUND");
  });
});
