import { describe, expect, it } from "vitest";
import { ApplyCancelledError } from "../entities/errors.js";
import { createSystemClock } from "./system-clock.js";

describe("SystemClock", () => {
    const clock = createSystemClock();

    it("should sleep for a short time", async () => {
        const before = clock.now();

        await clock.sleep(5);

        expect(clock.now()).toBeGreaterThanOrEqual(before);
    });

    it("should refuse to sleep once cancelled", async () => {
        const controller = new AbortController();
        controller.abort();

        const sleeping = clock.sleep(10_000, controller.signal);

        await expect(sleeping).rejects.toBeInstanceOf(ApplyCancelledError);
    });

    it("should wake early when cancelled mid-sleep", async () => {
        const controller = new AbortController();
        const sleeping = clock.sleep(10_000, controller.signal);

        controller.abort();

        await expect(sleeping).rejects.toBeInstanceOf(ApplyCancelledError);
    });
});
