/**
 * Test scenario discovery
 *
 * Directory structure:
 *   testcases/
 *   └── <category>/
 *       ├── config.yaml    # tests: input program → expected outcome per function
 *       └── *.yaml         # program documents
 */

import * as fs from "fs";
import * as path from "path";
import { parseConfigYaml } from "./config-parser.js";
import type { Scenario } from "./types.js";

export const discoverScenarios = (baseDir: string): readonly Scenario[] =>
  fs
    .readdirSync(baseDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .flatMap((category) => {
      const configPath = path.join(baseDir, category, "config.yaml");
      if (!fs.existsSync(configPath)) {
        return [];
      }
      return parseConfigYaml(fs.readFileSync(configPath, "utf-8")).map(
        (entry): Scenario => ({
          ...entry,
          category,
          inputPath: path.join(baseDir, category, entry.input),
        })
      );
    });
