#!/usr/bin/env node
import { Command } from "commander";
import { renderCommand } from "./commands/render.js";
import { initCommand } from "./commands/init.js";
import { validateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("vellum")
  .description("Render declarative vector-graphics scenes to SVG")
  .version("0.1.0");

program
  .command("render <input>")
  .description("Render a scene from a YAML/JSON file")
  .option("-o, --output <file>", "Output file path (default: <input>.svg)")
  .option("--width <measure>", "Image width, e.g. 12cm (default: scene width or 12cm)")
  .option("--height <measure>", "Image height, e.g. 8cm (default: scene height or 12cm)")
  .option("-f, --format <format>", "Output format (html, svg, png, pdf, ps)", "svg")
  .option(
    "--script-mode <mode>",
    "Script handling (none, exclude, embed, linkabs, linkrel)",
  )
  .action(renderCommand);

program
  .command("validate <input>")
  .description("Check that a scene parses and every measure resolves")
  .option("--width <measure>", "Image width to resolve against")
  .option("--height <measure>", "Image height to resolve against")
  .action(validateCommand);

program
  .command("init")
  .description("Write a template scene file (to stdout unless -o is given)")
  .option("-t, --template <name>", "Template name (basic, vector-batch)", "basic")
  .option("-o, --output <file>", "Write the template to a file")
  .option("--force", "Overwrite an existing output file")
  .action(initCommand);

program.parse();
