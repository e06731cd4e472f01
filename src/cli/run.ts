import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { check } from "../checker";
import { format_advisory, format_summary, to_report, write_report } from "./report";

export type CliOptions = {
  json?: boolean;
  pretty?: string | true;
  out?: string;
};

function to_pretty_spaces(opt: CliOptions): number {
  if (typeof opt.pretty !== "string") return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}

export function error_message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * 检查一个声明文件并输出建议，返回进程退出码：
 * 只要输入被检查过就是 0（即使有建议）；文件缺失、JSON 非法、结构错误为 1。
 */
export async function run_cli(file: string, opts: CliOptions): Promise<number> {
  const spaces = to_pretty_spaces(opts);
  const input_path = resolve(file);
  try {
    const content = await readFile(input_path, "utf8");
    let declarations: unknown;
    try {
      declarations = JSON.parse(content);
    } catch (e) {
      console.error(`❌ Invalid JSON in ${input_path}: ${error_message(e)}`);
      return 1;
    }

    const output = check({ declarations });
    if (!output.ok) {
      console.error(`❌ Invalid declaration tree, ${output.errors.length} error(s):`);
      for (const e of output.errors) {
        console.error(`  - [${e.code}] ${e.path} : ${e.message}`);
      }
      return 1;
    }

    const report_text = JSON.stringify(to_report(output), null, spaces);
    if (opts.json) {
      console.log(report_text);
    } else {
      for (const a of output.advisories) console.log(format_advisory(a));
      console.log(format_summary(output));
    }

    if (opts.out) {
      const target = await write_report(report_text, resolve(opts.out));
      console.error(`Report written to: ${target}`);
    }
    return 0;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      console.error(`❌ Not found: ${input_path}`);
    } else {
      console.error(`💥 Unexpected error: ${error_message(err)}`);
    }
    return 1;
  }
}
