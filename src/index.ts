#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { createApplyCittyCommand } from "./commands/apply.js";
import { createDestroyCittyCommand } from "./commands/destroy.js";
import { createForceUnlockCittyCommand } from "./commands/force-unlock.js";
import { createPlanCittyCommand } from "./commands/plan.js";
import { createEngineFactory } from "./engine.js";
import { createEngineConfigParser } from "./use-cases/parse-engine-config.js";
import { createApplyReportRenderer } from "./use-cases/render-apply-report.js";
import { createChangeSetRenderer } from "./use-cases/render-change-set.js";

const configParser = createEngineConfigParser();
const engine = createEngineFactory();
const changeSetRenderer = createChangeSetRenderer();
const applyDeps = {
    configParser,
    engine,
    changeSetRenderer,
    reportRenderer: createApplyReportRenderer(),
};

const main = defineCommand({
    meta: {
        name: "sitewright",
        description:
            "Provision and converge a static site on S3, CloudFront, ACM and Route 53 from a desired-state document",
    },
    subCommands: {
        plan: createPlanCittyCommand({
            configParser,
            engine,
            renderer: changeSetRenderer,
        }),
        apply: createApplyCittyCommand(applyDeps),
        destroy: createDestroyCittyCommand(applyDeps),
        "force-unlock": createForceUnlockCittyCommand({ configParser, engine }),
    },
});

runMain(main);
