/**
 * Preset listing command.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { listPresets } from "../presets-config.js";
import type { RenamePreset } from "../presets-config.js";

export function formatPresets(presets: readonly RenamePreset[]): string {
  return presets
    .map((preset) => {
      const replacement = preset.replacement === undefined ? "" : `  →  ${preset.replacement}`;
      return `${preset.name}: ${preset.pattern}${replacement}`;
    })
    .join("\n");
}

export async function runListPresets(): Promise<void> {
  const presets = await listPresets();
  p.note(formatPresets(presets), "Presets");
  p.outro(pc.dim(`${presets.length} preset(s)`));
}
