import { readFile } from "node:fs/promises";
import { defineCommand } from "citty";
import { consola } from "consola";
import type { EngineFactory } from "../engine.js";
import type { ContentSettings } from "../entities/engine-config.js";
import { PartialApplyError } from "../entities/errors.js";
import type { ApplyOutcome } from "../use-cases/converge.js";
import type { EngineConfigParser } from "../use-cases/parse-engine-config.js";
import type { ApplyReportRenderer } from "../use-cases/render-apply-report.js";
import type { ChangeSetRenderer } from "../use-cases/render-change-set.js";
import { parseAddressList, runWithExitCode } from "./exit-code.js";
import { readEngineConfig } from "./read-engine-config.js";

export interface ApplyConsoleOutput {
    log(message: string): void;
    warn(message: string): void;
}

export interface ApplyCommandDeps {
    readonly configParser: EngineConfigParser;
    readonly engine: EngineFactory;
    readonly changeSetRenderer: ChangeSetRenderer;
    readonly reportRenderer: ApplyReportRenderer;
}

export interface ApplyCommandOptions {
    readonly inputPath: string;
    readonly configPath?: string | undefined;
    readonly replace?: readonly string[] | undefined;
    readonly contentRoot?: string | undefined;
    readonly destroyAll?: boolean | undefined;
    readonly signal?: AbortSignal | undefined;
}

export interface ApplyCommand {
    execute(
        options: ApplyCommandOptions,
        console: ApplyConsoleOutput,
    ): Promise<ApplyOutcome>;
}

function contentSettingsFor(
    configured: ContentSettings | null,
    contentRoot: string | undefined,
    output: ApplyConsoleOutput,
): ContentSettings | null {
    if (contentRoot === undefined) {
        return configured;
    }
    if (!configured) {
        output.warn(
            "Ignoring --content: set content.bucket_address in the configuration file",
        );
        return null;
    }
    return { ...configured, root: contentRoot };
}

export function createApplyCommand(deps: ApplyCommandDeps): ApplyCommand {
    return {
        async execute(
            options: ApplyCommandOptions,
            output: ApplyConsoleOutput,
        ): Promise<ApplyOutcome> {
            const config = await readEngineConfig(
                deps.configParser,
                options.configPath,
            );
            const documentJson = await readFile(options.inputPath, "utf-8");
            const convergence = deps.engine.convergence(config);

            try {
                const outcome = await convergence.apply({
                    documentJson,
                    destroyAll: options.destroyAll,
                    replace: options.replace,
                    content: contentSettingsFor(
                        config.content,
                        options.contentRoot,
                        output,
                    ),
                    signal: options.signal,
                });
                output.log(deps.changeSetRenderer.renderText(outcome.changeSet));
                output.log(
                    deps.reportRenderer.render(outcome.result, outcome.content),
                );
                return outcome;
            } catch (error) {
                if (error instanceof PartialApplyError) {
                    output.log(
                        deps.reportRenderer.render(error.result, error.content),
                    );
                }
                throw error;
            }
        },
    };
}

// SIGINT stops new work and cancels in-flight waits
export async function withInterruptSignal<T>(
    work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
    const controller = new AbortController();
    const onInterrupt = () => {
        consola.warn("Interrupted, finishing in-flight operations");
        controller.abort();
    };
    process.once("SIGINT", onInterrupt);
    try {
        return await work(controller.signal);
    } finally {
        process.removeListener("SIGINT", onInterrupt);
    }
}

export function createApplyCittyCommand(deps: ApplyCommandDeps) {
    const applyCommand = createApplyCommand(deps);

    return defineCommand({
        meta: {
            name: "apply",
            description:
                "Converge the infrastructure on the desired state and sync site content",
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
            replace: {
                type: "string",
                description: "Comma-separated addresses to replace",
            },
            content: {
                type: "string",
                description: "Directory to upload once the site is ready",
            },
        },
        async run({ args }) {
            await runWithExitCode(async () => {
                await withInterruptSignal((signal) =>
                    applyCommand.execute(
                        {
                            inputPath: args.input,
                            configPath: args.config,
                            replace: parseAddressList(args.replace),
                            contentRoot: args.content,
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
