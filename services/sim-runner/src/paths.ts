import { join } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));

export const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
export const DEFAULT_DATASETS_DIR = join(REPO_ROOT, "storage", "datasets");
export const DEFAULT_RUNS_DIR = join(REPO_ROOT, "storage", "runs");
export const DEFAULT_CUSTOM_DIR = join(REPO_ROOT, "storage", "decision-makers", "custom");
