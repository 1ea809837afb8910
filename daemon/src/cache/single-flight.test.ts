import { describe, it, expect } from "vitest";
import { SingleFlight } from "./single-flight.js";

describe("SingleFlight", () => {
  it("joins callers while a key is in flight", async () => {
    const flights = new SingleFlight<number>();
    let calls = 0;
    let release: (value: number) => void = () => {};
    const gate = new Promise<number>((resolve) => {
      release = resolve;
    });
    const fn = (): Promise<number> => {
      calls++;
      return gate;
    };

    const first = flights.run("k", fn);
    const second = flights.run("k", fn);
    expect(second).toBe(first);
    expect(flights.isInFlight("k")).toBe(true);

    release(7);
    await expect(first).resolves.toBe(7);
    expect(calls).toBe(1);
    expect(flights.size).toBe(0);
  });

  it("releases the slot after a rejection", async () => {
    const flights = new SingleFlight<number>();
    await expect(
      flights.run("k", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(flights.isInFlight("k")).toBe(false);
    await expect(flights.run("k", async () => 3)).resolves.toBe(3);
  });

  it("keeps different keys independent", async () => {
    const flights = new SingleFlight<string>();
    const a = flights.run("a", async () => "A");
    const b = flights.run("b", async () => "B");
    expect(flights.keys().sort()).toEqual(["a", "b"]);
    expect(await Promise.all([a, b])).toEqual(["A", "B"]);
  });
});
