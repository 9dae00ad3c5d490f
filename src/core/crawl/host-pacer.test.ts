import { describe, expect, it } from "vitest";
import { HostPacer, type Clock } from "./host-pacer";

/** Time only moves when the pacer sleeps */
function fakeClock() {
  let now = 1_000;
  const slept: number[] = [];
  const clock: Clock = {
    now: () => now,
    sleep: async (ms) => {
      slept.push(ms);
      now += ms;
    },
  };
  return {
    clock,
    slept,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("HostPacer", () => {
  it("should space successive requests to one host", async () => {
    const { clock, slept } = fakeClock();
    const pacer = new HostPacer(250, clock);

    expect(await pacer.wait("https://api.test/a")).toBe(0);
    expect(await pacer.wait("https://api.test/b")).toBe(250);
    expect(await pacer.wait("https://api.test/c")).toBe(250);
    expect(slept).toEqual([250, 250]);
  });

  it("should not wait when the delay has already passed", async () => {
    const { clock, advance } = fakeClock();
    const pacer = new HostPacer(250, clock);

    await pacer.wait("https://api.test/a");
    advance(400);

    expect(await pacer.wait("https://api.test/b")).toBe(0);
  });

  it("should pace hosts independently", async () => {
    const { clock, slept } = fakeClock();
    const pacer = new HostPacer(250, clock);

    await pacer.wait("https://api.test/a");
    await pacer.wait("https://cdn.test/a");

    expect(slept).toEqual([]);
  });

  it("should queue concurrent callers behind each other", async () => {
    const slept: number[] = [];
    const pacer = new HostPacer(100, {
      now: () => 0,
      sleep: async (ms) => {
        slept.push(ms);
      },
    });

    const waits = await Promise.all([
      pacer.wait("https://api.test/1"),
      pacer.wait("https://api.test/2"),
      pacer.wait("https://api.test/3"),
    ]);

    expect(waits).toEqual([0, 100, 200]);
  });

  it("should never wait with a zero delay", async () => {
    const { clock, slept } = fakeClock();
    const pacer = new HostPacer(0, clock);

    await pacer.wait("https://api.test/a");
    await pacer.wait("https://api.test/a");

    expect(slept).toEqual([]);
  });
});
