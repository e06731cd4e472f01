import { writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Advisory, CheckOutput } from "../types";

/** 一行文本输出：`warning: [CODE] /0/children/1 : message` */
export function format_advisory(a: Advisory): string {
  return `${a.severity}: [${a.code}] ${a.path} : ${a.message}`;
}

export function format_summary(output: CheckOutput): string {
  const n = output.advisories.length;
  return n === 0 ? "No naming advisories" : `${n} naming advisor${n === 1 ? "y" : "ies"}`;
}

/** JSON 报告：去掉节点引用（整棵子树），只留名称 */
export function to_report(output: CheckOutput) {
  return {
    ok: output.ok,
    errors: output.errors,
    advisories: output.advisories.map(a => ({
      severity: a.severity,
      code: a.code,
      path: a.path,
      name: a.node.simple_name,
      message: a.message,
    })),
    time_ms: output.time_ms,
  };
}

/** 把已排好版的报告文本落盘（自动建目录，保证末尾换行），返回目标路径 */
export async function write_report(text: string, target: string): Promise<string> {
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, text.endsWith("\n") ? text : `${text}\n`, "utf8");
  return target;
}
