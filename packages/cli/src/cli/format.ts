/**
 * CLI Output Formatting
 *
 * Renders descriptors as boxen panels and launch plans as JSON.
 */

import boxen from "boxen";
import pc from "picocolors";
import { flagNames, type FileInfo } from "@filemeta/core";
import type { LaunchPlan } from "../fileinfo/index.js";

/**
 * Label/value rows shown for a descriptor, in display order.
 */
export function describeFileInfo(info: FileInfo): Array<[string, string]> {
  const flags = flagNames(info.flags);
  const rows: Array<[string, string]> = [
    ["Path", info.path],
    ["Kind", info.kind],
    ["Type", info.contentType.name],
    ["Mode", info.mode.toString(8).padStart(4, "0")],
    ["Flags", flags.length > 0 ? flags.join(", ") : "none"],
    ["Owner", `${info.uid}:${info.gid}`],
    ["Size", `${info.size} bytes`],
    ["Modified", new Date(info.mtime).toISOString()],
    ["Inode", info.inode.toString()],
  ];

  const icon = info.getHint("icon");
  const name = info.getHint("name");
  if (icon !== undefined) rows.push(["Icon", icon]);
  if (name !== undefined) rows.push(["Name", name]);
  return rows;
}

export function formatFileInfoPanel(info: FileInfo): string {
  const body = describeFileInfo(info)
    .map(([label, value]) => `${pc.bold(label)}: ${value}`)
    .join("\n");

  return boxen(body, {
    title: pc.green(info.displayName),
    padding: { left: 1, right: 1, top: 0, bottom: 0 },
    borderColor: "green",
    borderStyle: "round",
  });
}

export function formatFileInfoJson(infos: readonly FileInfo[]): string {
  return JSON.stringify(infos.map((info) => info.toJSON()), null, 2);
}

export function formatLaunchPlan(plan: LaunchPlan): string {
  return JSON.stringify(
    { workingDirectory: plan.workingDirectory, argv: plan.argv, display: plan.display ?? null },
    null,
    2
  );
}
