import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { isKnownModeName } from "../domain/gates/modes.js";

// Load environment variables
dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const DEFAULT_DATA_DIR = path.resolve(__dirname, "../../data");

export interface ScreeningConfig {
  checklistDir: string;
  rulesPath: string;
  defaultMode: string;
  reasonsMaxItems: number;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envPath(key: string, fallback: string): string {
  const val = process.env[key]?.trim();
  return val ? path.resolve(val) : fallback;
}

/**
 * Loads screening configuration from environment variables.
 * Paths default to the bundled data/ directory.
 */
export function loadScreeningConfig(): ScreeningConfig {
  return {
    checklistDir: envPath(
      "SCREEN_CHECKLIST_DIR",
      path.join(DEFAULT_DATA_DIR, "checklist"),
    ),
    rulesPath: envPath(
      "SCREEN_RULES_PATH",
      path.join(DEFAULT_DATA_DIR, "eligibility_rules.json"),
    ),
    defaultMode: (process.env.SCREEN_DEFAULT_MODE ?? "").trim() || "strict",
    reasonsMaxItems: Math.min(
      20,
      Math.max(0, envInt("SCREEN_REASONS_MAX_ITEMS", 3)),
    ),
  };
}

/**
 * Validate config at startup. Throws with every problem listed.
 */
export function validateScreeningConfig(config: ScreeningConfig): void {
  const errors: string[] = [];

  if (!config.checklistDir) {
    errors.push("checklistDir must not be empty");
  }
  if (!config.rulesPath.toLowerCase().endsWith(".json")) {
    errors.push("rulesPath must point to a .json file");
  }
  if (!isKnownModeName(config.defaultMode)) {
    errors.push(
      `defaultMode "${config.defaultMode}" is not a screening mode or alias`,
    );
  }
  if (!Number.isInteger(config.reasonsMaxItems) || config.reasonsMaxItems < 0) {
    errors.push("reasonsMaxItems must be a non-negative integer");
  }

  if (errors.length > 0) {
    throw new Error(
      `Invalid screening config:\n  - ${errors.join("\n  - ")}`,
    );
  }
}

export function loadConfig(
  overrides: Partial<ScreeningConfig> = {},
): ScreeningConfig {
  const config = { ...loadScreeningConfig(), ...overrides };
  validateScreeningConfig(config);
  return config;
}
