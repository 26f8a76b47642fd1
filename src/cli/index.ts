#!/usr/bin/env node
import { Command } from "commander";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join, resolve, dirname } from "node:path";
import { derive_all } from "../compiler";
import type { DeriveOutput } from "../types";

/** 生成一个"写入器"：把文本落到 baseDir 下，保证末尾换行 */
export function create_folder_writer(baseDir: string) {
  return async (content: string, filename: string): Promise<string> => {
    const target = join(baseDir, filename);
    await mkdir(dirname(target), { recursive: true });
    const text = content.endsWith("\n") ? content : content + "\n";
    await writeFile(target, text, "utf8");
    return target;
  };
}

type CliOptions = {
  pretty?: string | boolean;
  minify?: boolean;
  out?: string;
  strict?: boolean;
  namespace?: string;
};

function to_pretty_spaces(opt: CliOptions): number {
  if (opt.minify) return 0;
  if (opt.pretty === false) return 0;
  if (opt.pretty === true || opt.pretty === undefined) return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}

function error_message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function report(label: string, out: DeriveOutput): void {
  for (const w of out.warnings) {
    console.warn(`⚠️  ${label} [${w.code}] ${w.path || "/"} : ${w.message}`);
  }
  if (!out.ok) {
    console.error(`❌ ${label} failed with ${out.errors.length} error(s):`);
    for (const e of out.errors) {
      console.error(`  - [${e.code}] ${e.path || "/"} : ${e.message}${e.hint ? ` (${e.hint})` : ""}`);
    }
  }
}

const program = new Command();

program
  .name("strict-derive")
  .description("Derive strict binary codec plans from type specs")
  .version("0.1.0")
  .argument("<folder>", "folder path containing types.json")
  .option("--pretty [n]", "pretty-print JSON with n spaces (default: 2)", false)
  .option("--minify", "minify JSON (overrides --pretty)", false)
  .option("-o, --out <file>", "output file name inside the folder (default: plans.out.json)")
  .option("--strict", "treat warnings as errors", false)
  .option("--namespace <path>", "default codec namespace when a type sets no `crate`")
  .action(async (folder: string, opts: CliOptions) => {
    const spaces = to_pretty_spaces(opts);
    const baseDir = resolve(folder);
    const specPath = join(baseDir, "types.json");
    const outFile = opts.out ?? "plans.out.json";
    try {
      const content = await readFile(specPath, "utf8");
      console.log(`Reading type specs: ${specPath}`);
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (e) {
        console.error(`❌ Invalid JSON in ${specPath}: ${error_message(e)}`);
        process.exitCode = 1;
        return;
      }

      const type_specs = Array.isArray(parsed) ? parsed : [parsed];
      const outputs = derive_all({
        type_specs,
        options: { strict: opts.strict, default_namespace: opts.namespace },
      });

      let failed = 0;
      outputs.forEach((out, i) => {
        report(out.plan?.type_name ?? `types[${i}]`, out);
        if (!out.ok) failed++;
      });
      if (failed) {
        process.exitCode = 1;
        return;
      }

      const plans = outputs.flatMap((o) => (o.plan ? [o.plan] : []));
      const write = create_folder_writer(baseDir);
      const target = await write(JSON.stringify(plans, null, spaces), outFile);
      console.log(`✅ ${plans.length} plan(s) written to: ${target}`);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        console.error(`❌ Not found: ${specPath}`);
      } else {
        console.error(`💥 Unexpected error: ${error_message(err)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 Unexpected error: ${error_message(err)}`);
  process.exitCode = 1;
});
