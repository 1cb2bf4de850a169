import { defineCommand } from "citty";
import { consola } from "consola";
import type { EngineFactory } from "../engine.js";
import type { EngineConfigParser } from "../use-cases/parse-engine-config.js";
import { runWithExitCode } from "./exit-code.js";
import { readEngineConfig } from "./read-engine-config.js";

export interface ForceUnlockConsoleOutput {
    log(message: string): void;
    warn(message: string): void;
}

export interface ForceUnlockCommandDeps {
    readonly configParser: EngineConfigParser;
    readonly engine: EngineFactory;
}

export interface ForceUnlockCommand {
    execute(
        configPath: string | undefined,
        console: ForceUnlockConsoleOutput,
    ): Promise<boolean>;
}

export function createForceUnlockCommand(
    deps: ForceUnlockCommandDeps,
): ForceUnlockCommand {
    return {
        async execute(
            configPath: string | undefined,
            output: ForceUnlockConsoleOutput,
        ): Promise<boolean> {
            const config = await readEngineConfig(deps.configParser, configPath);
            const removed = await deps.engine.stateStore(config).forceUnlock();
            if (removed) {
                output.log(`Removed the lock on ${config.statePath}`);
            } else {
                output.warn(`${config.statePath} was not locked`);
            }
            return removed;
        },
    };
}

export function createForceUnlockCittyCommand(deps: ForceUnlockCommandDeps) {
    const forceUnlockCommand = createForceUnlockCommand(deps);

    return defineCommand({
        meta: {
            name: "force-unlock",
            description:
                "Remove a state lock left behind by a process that no longer runs",
        },
        args: {
            config: {
                type: "string",
                description: "Path to sitewright.config.json",
            },
        },
        async run({ args }) {
            await runWithExitCode(async () => {
                await forceUnlockCommand.execute(args.config, {
                    log: (msg) => consola.log(msg),
                    warn: (msg) => consola.warn(msg),
                });
            });
        },
    });
}
