import { defineCommand } from "citty";
import { consola } from "consola";
import {
    type ApplyCommandDeps,
    createApplyCommand,
    withInterruptSignal,
} from "./apply.js";
import { runWithExitCode } from "./exit-code.js";

export function createDestroyCittyCommand(deps: ApplyCommandDeps) {
    const applyCommand = createApplyCommand(deps);

    return defineCommand({
        meta: {
            name: "destroy",
            description: "Destroy every resource recorded in state",
        },
        args: {
            input: {
                type: "string",
                description: "Path to the desired-state JSON document",
                required: true,
            },
            config: {
                type: "string",
                description: "Path to sitewright.config.json",
            },
        },
        async run({ args }) {
            await runWithExitCode(async () => {
                await withInterruptSignal((signal) =>
                    applyCommand.execute(
                        {
                            inputPath: args.input,
                            configPath: args.config,
                            destroyAll: true,
                            signal,
                        },
                        {
                            log: (msg) => consola.log(msg),
                            warn: (msg) => consola.warn(msg),
                        },
                    ),
                );
            });
        },
    });
}
