#!/usr/bin/env node
import { Command } from "commander";
import path from "path";
import fs from "fs";
import { createHookContext, HookContext } from "../hooks/context";
import { install } from "../hooks/install";
import { configure, templateContext } from "../hooks/configure";
import { readinessReport, services } from "../core/readiness";
import { mergeDefaults } from "../core/settings-tree";
import { withSecretPlaceholders } from "../config/settings";
import { getTemplate } from "../core/templates";

const program = new Command();

interface ContextOptions {
  config?: string;
}

function buildContext(opts: ContextOptions): HookContext {
  return createHookContext(process.env, {
    settingsFile: opts.config ? path.resolve(opts.config) : undefined,
  });
}

async function runOrExit(label: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${label} failed: ${message}`);
    process.exit(1);
  }
}

program
  .name("hypervisor-hooks")
  .description("Install and configure hooks for the OpenStack hypervisor snap")
  .version("0.1.0");

program
  .command("install")
  .description("Run the install hook")
  .option("-c, --config <path>", "Settings file to use instead of snapctl")
  .action(async (opts: ContextOptions) => {
    await runOrExit("Install hook", async () => {
      await install(buildContext(opts));
    });
  });

program
  .command("configure")
  .description("Run the configure hook")
  .option("-c, --config <path>", "Settings file to use instead of snapctl")
  .action(async (opts: ContextOptions) => {
    await runOrExit("Configure hook", async () => {
      const report = await configure(buildContext(opts));
      const started = report.filter(entry => entry.ready).map(entry => entry.service);
      console.log(`✅ Configured. Running services: ${started.join(", ") || "none"}`);
    });
  });

program
  .command("services")
  .description("List managed services")
  .action(() => {
    services().forEach(service => console.log(service));
  });

program
  .command("status")
  .description("Show which services have the settings they need")
  .option("-c, --config <path>", "Settings file to use instead of snapctl")
  .option("--json", "Output JSON", false)
  .action(async (opts: ContextOptions & { json: boolean }) => {
    await runOrExit("Status check", async () => {
      const ctx = buildContext(opts);
      const settings = mergeDefaults(await ctx.settings.load(), ctx.defaults());
      const report = readinessReport(settings);

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      console.log("📊 Hypervisor services:");
      report.forEach(entry => {
        const detail = entry.ready ? "ready" : `waiting for ${entry.blockedBy.join(", ")}`;
        console.log(`   ${entry.ready ? "✅" : "⏳"} ${entry.service}: ${detail}`);
      });
    });
  });

program
  .command("render")
  .description("Render one template to stdout; secrets not generated yet render empty")
  .argument("<template>", "Template file name, e.g. nova.conf.liquid")
  .option("-c, --config <path>", "Settings file to use instead of snapctl")
  .action(async (name: string, opts: ContextOptions) => {
    await runOrExit("Render", async () => {
      const ctx = buildContext(opts);
      const settings = withSecretPlaceholders(mergeDefaults(await ctx.settings.load(), ctx.defaults()));
      const template = await getTemplate(ctx.paths.snap, name);
      const text = await template.render(templateContext(settings, ctx.paths, fs.existsSync(ctx.kvmDevice)));
      process.stdout.write(text);
    });
  });

program.parseAsync().catch(error => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
