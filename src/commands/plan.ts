import { readFile } from "node:fs/promises";
import { defineCommand } from "citty";
import { consola } from "consola";
import type { EngineFactory } from "../engine.js";
import type { PlanOutcome } from "../use-cases/converge.js";
import type { EngineConfigParser } from "../use-cases/parse-engine-config.js";
import type { ChangeSetRenderer } from "../use-cases/render-change-set.js";
import { parseAddressList, runWithExitCode } from "./exit-code.js";
import { readEngineConfig } from "./read-engine-config.js";

export interface PlanConsoleOutput {
    log(message: string): void;
    warn(message: string): void;
}

export interface PlanCommandDeps {
    readonly configParser: EngineConfigParser;
    readonly engine: EngineFactory;
    readonly renderer: ChangeSetRenderer;
}

export interface PlanCommandOptions {
    readonly inputPath: string;
    readonly configPath?: string | undefined;
    readonly json?: boolean | undefined;
    readonly destroyAll?: boolean | undefined;
    readonly replace?: readonly string[] | undefined;
}

export interface PlanCommand {
    execute(
        options: PlanCommandOptions,
        console: PlanConsoleOutput,
    ): Promise<PlanOutcome>;
}

export function createPlanCommand(deps: PlanCommandDeps): PlanCommand {
    return {
        async execute(
            options: PlanCommandOptions,
            output: PlanConsoleOutput,
        ): Promise<PlanOutcome> {
            const config = await readEngineConfig(
                deps.configParser,
                options.configPath,
            );
            const documentJson = await readFile(options.inputPath, "utf-8");
            const outcome = await deps.engine.convergence(config).plan({
                documentJson,
                destroyAll: options.destroyAll,
                replace: options.replace,
            });

            for (const key of outcome.strippedKeys) {
                output.warn(`Removed unsafe key: ${key}`);
            }
            output.log(
                options.json
                    ? deps.renderer.renderJson(outcome.changeSet)
                    : deps.renderer.renderText(outcome.changeSet),
            );
            return outcome;
        },
    };
}

export function createPlanCittyCommand(deps: PlanCommandDeps) {
    const planCommand = createPlanCommand(deps);

    return defineCommand({
        meta: {
            name: "plan",
            description:
                "Show the changes needed to converge on the desired state, without making them",
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
            json: {
                type: "boolean",
                description: "Print the change set as JSON",
                default: false,
            },
            destroy: {
                type: "boolean",
                description: "Plan the removal of every managed resource",
                default: false,
            },
            replace: {
                type: "string",
                description: "Comma-separated addresses to replace",
            },
        },
        async run({ args }) {
            await runWithExitCode(async () => {
                await planCommand.execute(
                    {
                        inputPath: args.input,
                        configPath: args.config,
                        json: args.json,
                        destroyAll: args.destroy,
                        replace: parseAddressList(args.replace),
                    },
                    {
                        log: (msg) => consola.log(msg),
                        warn: (msg) => consola.warn(msg),
                    },
                );
            });
        },
    });
}
