import { existsSync, writeFileSync } from "node:fs";
import { basicTemplate } from "../templates/basic.js";
import { vectorBatchTemplate } from "../templates/vector-batch.js";

const templates: Record<string, string> = {
  basic: basicTemplate,
  "vector-batch": vectorBatchTemplate,
};

interface InitOptions {
  template: string;
  output?: string;
  force?: boolean;
}

export function initCommand(options: InitOptions): void {
  const scene = templates[options.template];
  if (!scene) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    process.exit(1);
  }

  if (!options.output) {
    process.stdout.write(scene);
    return;
  }

  if (existsSync(options.output) && !options.force) {
    console.error(`Refusing to overwrite ${options.output} (use --force)`);
    process.exit(1);
  }
  writeFileSync(options.output, scene, "utf-8");
  console.log(`Created: ${options.output}`);
}
