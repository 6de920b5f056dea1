import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { FlowDslSchema } from "./flowDslTypes.js";
import type { FlowDsl } from "./flowDslTypes.js";

/**
 * Parses and validates a YAML flow file against the flow DSL schema.
 */
export function loadFlowDsl(filePath: string): FlowDsl {
  const raw = readFileSync(filePath, "utf-8");
  return parseFlowDslFromText(raw);
}

/**
 * Parses raw YAML text (not a file path) into a validated FlowDsl.
 * Useful for testing without filesystem access.
 */
export function parseFlowDslFromText(yamlText: string): FlowDsl {
  const parsed: unknown = parseYaml(yamlText);
  return FlowDslSchema.parse(parsed);
}
