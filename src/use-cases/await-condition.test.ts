import { describe, expect, it, vi } from "vitest";
import {
    ApplyCancelledError,
    AsyncConditionTimeout,
    ProviderError,
} from "../entities/errors.js";
import { createFakeClock } from "../lib/fake-clock.js";
import { createConditionWaiter } from "./await-condition.js";

function setup() {
    const clock = createFakeClock();
    const logger = {
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        debug: vi.fn<(message: string) => void>(),
    };
    return { clock, logger, waiter: createConditionWaiter({ clock, logger }) };
}

const OPTIONS = {
    description: "the widget",
    pollIntervalMs: 30,
    timeoutMs: 100,
};

describe("ConditionWaiter", () => {
    describe("given a condition that is already met", () => {
        it("should resolve without sleeping", async () => {
            // Arrange
            const { clock, waiter } = setup();

            // Act
            const result = await waiter.await(async () => true, OPTIONS);

            // Assert
            expect(result).toBe("ready");
            expect(clock.sleeps).toEqual([]);
        });
    });

    describe("given a condition met on the third poll", () => {
        it("should sleep the poll interval between polls", async () => {
            // Arrange
            const { clock, waiter } = setup();
            const answers = [false, false, true];
            const predicate = vi.fn(async () => answers.shift() ?? false);

            // Act
            await waiter.await(predicate, OPTIONS);

            // Assert
            expect(predicate).toHaveBeenCalledTimes(3);
            expect(clock.sleeps).toEqual([30, 30]);
            expect(clock.now()).toBe(60);
        });
    });

    describe("given a condition that is never met", () => {
        it("should time out, shortening the last sleep to the deadline", async () => {
            // Arrange
            const { clock, waiter } = setup();

            // Act
            const error = await waiter
                .await(async () => false, OPTIONS)
                .catch((caught: unknown) => caught);

            // Assert
            expect(error).toBeInstanceOf(AsyncConditionTimeout);
            expect(error).toMatchObject({ attempts: 5, timeoutMs: 100 });
            expect(clock.sleeps).toEqual([30, 30, 30, 10]);
            expect(clock.now()).toBe(100);
        });
    });

    describe("given a transient error while polling", () => {
        it("should log it and keep polling", async () => {
            // Arrange
            const { logger, waiter } = setup();
            const predicate = vi
                .fn<() => Promise<boolean>>()
                .mockRejectedValueOnce(
                    new ProviderError("throttled", { transient: true }),
                )
                .mockResolvedValueOnce(true);

            // Act
            const result = await waiter.await(predicate, OPTIONS);

            // Assert
            expect(result).toBe("ready");
            expect(logger.warn).toHaveBeenCalledWith(
                "Poll 1 for the widget failed transiently, will retry",
            );
        });
    });

    describe("given a permanent error while polling", () => {
        it("should rethrow it", async () => {
            // Arrange
            const { waiter } = setup();
            const failure = new ProviderError("certificate revoked", {
                transient: false,
            });

            // Act
            const attempt = waiter.await(async () => {
                throw failure;
            }, OPTIONS);

            // Assert
            await expect(attempt).rejects.toBe(failure);
        });
    });

    describe("given a cancelled signal", () => {
        it("should stop with an ApplyCancelledError", async () => {
            // Arrange
            const { waiter } = setup();
            const controller = new AbortController();
            controller.abort();

            // Act
            const attempt = waiter.await(async () => false, {
                ...OPTIONS,
                signal: controller.signal,
            });

            // Assert
            await expect(attempt).rejects.toBeInstanceOf(ApplyCancelledError);
        });

        it("should stop a sleep in progress", async () => {
            // Arrange
            const { waiter } = setup();
            const controller = new AbortController();
            const predicate = vi.fn(async () => {
                controller.abort();
                return false;
            });

            // Act
            const attempt = waiter.await(predicate, {
                ...OPTIONS,
                signal: controller.signal,
            });

            // Assert
            await expect(attempt).rejects.toBeInstanceOf(ApplyCancelledError);
            expect(predicate).toHaveBeenCalledTimes(1);
        });
    });
});
