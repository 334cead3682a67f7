import { describe, expect, it } from "vitest";

import { Throttle } from "../utils/throttle";
import { fakeClock } from "./fakes";

describe("Throttle", () => {
  it("does not wait before the first call", async () => {
    const { clock } = fakeClock(5_000);
    const t = new Throttle(10_000, clock);
    expect(await t.wait()).toBe(0);
    expect(clock.now()).toBe(5_000);
  });

  it("waits out the rest of the delay since the previous start", async () => {
    const { clock, advance } = fakeClock();
    const t = new Throttle(10_000, clock);
    await t.wait();
    advance(4_000);
    expect(await t.wait()).toBe(6_000);
    expect(clock.now()).toBe(10_000);
  });

  it("adds nothing when the previous call outlasted the delay", async () => {
    const { clock, advance } = fakeClock();
    const t = new Throttle(10_000, clock);
    await t.wait();
    advance(12_000);
    expect(await t.wait()).toBe(0);
    expect(await t.wait()).toBe(10_000);
  });

  it("keeps separate state per instance", async () => {
    const { clock } = fakeClock();
    const a = new Throttle(10_000, clock);
    const b = new Throttle(10_000, clock);
    await a.wait();
    expect(await b.wait()).toBe(0);
  });
});
