import { existsSync, readFileSync, unlinkSync } from "node:fs";
import {
  OutputFormatSchema,
  drawScene,
  getDefaults,
  parseMeasure,
  parseScene,
  setDefaultScriptMode,
} from "@vellum/core";
import { createBackend } from "@vellum/render-svg";

interface RenderOptions {
  output?: string;
  width?: string;
  height?: string;
  format: string;
  scriptMode?: string;
}

export function renderCommand(input: string, options: RenderOptions): void {
  // Set once the output file has been opened; removed again if rendering fails
  let written: string | null = null;
  try {
    const format = OutputFormatSchema.safeParse(options.format);
    if (!format.success) {
      throw new Error(
        `Unknown format "${options.format}". Expected one of: ${OutputFormatSchema.options.join(", ")}`,
      );
    }
    if (options.scriptMode !== undefined) {
      setDefaultScriptMode(options.scriptMode);
    }

    const content = readFileSync(input, "utf-8");
    const doc = parseScene(content);
    const defaults = getDefaults();

    const width = options.width ? parseMeasure(options.width) : (doc.width ?? defaults.graphicWidth);
    const height = options.height
      ? parseMeasure(options.height)
      : (doc.height ?? defaults.graphicHeight);

    const extension = format.data === "html" ? "svg" : format.data;
    const outputPath =
      options.output ?? input.replace(/\.(ya?ml|json)$/i, "") + `.${extension}`;

    const backend = createBackend(format.data, outputPath, width, height, { defaults });
    written = outputPath;
    drawScene(backend, doc.root);
    console.log(`Rendered: ${outputPath}`);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    if (written !== null && existsSync(written)) {
      unlinkSync(written);
    }
    process.exit(1);
  }
}
