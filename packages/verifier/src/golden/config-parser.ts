/**
 * config.yaml parser for golden tests
 */

import YAML from "yaml";
import type { Expectation, TestEntry } from "./types.js";

const OUTCOMES = new Set([
  "accepted",
  "UseAfterMove",
  "DoubleInit",
  "TypeMismatch",
  "DanglingLifetime",
  "ObligationUnproved",
  "NonExhaustiveSwitch",
  "UnresolvedTraitBound",
  "MalformedContext",
]);

const parseExpect = (
  value: unknown,
  input: string
): ReadonlyMap<string, Expectation> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`expect for ${input} must map function names to outcomes`);
  }
  const expectations = new Map<string, Expectation>();
  for (const [name, outcome] of Object.entries(value)) {
    if (typeof outcome !== "string" || !OUTCOMES.has(outcome)) {
      throw new Error(
        `Invalid outcome for ${input}:${name}: ${JSON.stringify(outcome)}`
      );
    }
    expectations.set(name, outcome);
  }
  return expectations;
};

/**
 * Parse config.yaml and extract test entries
 */
export const parseConfigYaml = (yamlContent: string): readonly TestEntry[] => {
  const parsed: unknown = YAML.parse(yamlContent);

  if (!Array.isArray(parsed)) {
    throw new Error("config.yaml must be a list of test entries");
  }

  return parsed.map((entry: unknown): TestEntry => {
    if (typeof entry !== "object" || entry === null) {
      throw new Error(`Invalid test entry: ${JSON.stringify(entry)}`);
    }
    const input: unknown = "input" in entry ? entry.input : undefined;
    if (typeof input !== "string" || !input.endsWith(".yaml")) {
      throw new Error(`Invalid input (must end with .yaml): ${String(input)}`);
    }
    const title: unknown = "title" in entry ? entry.title : undefined;
    return {
      input,
      title: typeof title === "string" ? title : input,
      expect: parseExpect("expect" in entry ? entry.expect : undefined, input),
    };
  });
};
