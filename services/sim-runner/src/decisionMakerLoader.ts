import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { createJiti } from "jiti";
import { z } from "zod";

import {
  createBuiltinDecisionMaker,
  isBuiltinDecisionMaker,
  type DecisionMaker,
} from "@daybook/sdk";
import { createLogger, type Logger } from "@daybook/logger";

import { DEFAULT_CUSTOM_DIR } from "./paths.js";

const jiti = createJiti(import.meta.url, { interopDefault: true });

const CustomModuleSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    description: z.string().default(""),
    version: z.string().optional(),
    tags: z.array(z.string()).optional(),
  }),
  createDecisionMaker: z.function().args(z.unknown()).returns(z.unknown()),
});

export type CustomDecisionMakerMetadata = z.infer<typeof CustomModuleSchema>["metadata"];

export interface CustomDecisionMaker {
  readonly metadata: CustomDecisionMakerMetadata;
  readonly filename: string;
  create(params: unknown): DecisionMaker;
}

export interface LoaderOptions {
  readonly dir?: string;
  readonly logger?: Logger;
}

const isOptionalFunction = (value: unknown): boolean =>
  value === undefined || typeof value === "function";

export const isDecisionMaker = (value: unknown): value is DecisionMaker => {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const candidate = value as Record<string, unknown>;
  return (
    typeof candidate.name === "string" &&
    typeof candidate.decide === "function" &&
    isOptionalFunction(candidate.onStart) &&
    isOptionalFunction(candidate.onFinish)
  );
};

const isModuleFile = (filename: string): boolean =>
  filename.endsWith(".ts") && !filename.endsWith(".d.ts") && !filename.includes(".test.");

const isMissingDirectory = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Discovers decision maker modules in `dir`. Each module exports `metadata` and
 * `createDecisionMaker(params)`; files that fail to load or lack either export are skipped.
 */
export const loadCustomDecisionMakers = async (
  options: LoaderOptions = {},
): Promise<Record<string, CustomDecisionMaker>> => {
  const dir = options.dir ?? DEFAULT_CUSTOM_DIR;
  const logger = options.logger ?? createLogger("services/sim-runner");

  let files: string[];
  try {
    files = await readdir(dir);
  } catch (error) {
    if (isMissingDirectory(error)) {
      logger.debug("No custom decision maker directory", { dir });
      return {};
    }
    throw error;
  }

  const loaded: Record<string, CustomDecisionMaker> = {};
  for (const filename of files.filter(isModuleFile).sort()) {
    let exported: unknown;
    try {
      exported = await jiti.import(join(dir, filename));
    } catch (error) {
      logger.error("Failed to load custom decision maker", { filename, error });
      continue;
    }

    const parsed = CustomModuleSchema.safeParse(exported);
    if (!parsed.success) {
      logger.warn("Skipping module without metadata and createDecisionMaker exports", {
        filename,
      });
      continue;
    }

    const { metadata, createDecisionMaker } = parsed.data;
    if (loaded[metadata.name]) {
      logger.warn("Duplicate custom decision maker name; keeping the first", {
        name: metadata.name,
        filename,
      });
      continue;
    }
    loaded[metadata.name] = {
      metadata,
      filename,
      create(params: unknown): DecisionMaker {
        const instance = createDecisionMaker(params);
        if (!isDecisionMaker(instance)) {
          throw new Error(`${filename}: createDecisionMaker did not return a decision maker`);
        }
        return instance;
      },
    };
    logger.debug("Loaded custom decision maker", { name: metadata.name, filename });
  }
  return loaded;
};

/**
 * Resolves `key` to a built-in decision maker, falling back to the custom modules in `dir`.
 */
export const resolveDecisionMaker = async (
  key: string,
  params: unknown,
  options: LoaderOptions = {},
): Promise<DecisionMaker> => {
  if (isBuiltinDecisionMaker(key)) {
    return createBuiltinDecisionMaker(key, params);
  }
  const custom = await loadCustomDecisionMakers(options);
  const entry = custom[key];
  if (!entry) {
    const known = Object.keys(custom).sort();
    throw new Error(
      `Unknown decision maker "${key}"${known.length > 0 ? ` (custom: ${known.join(", ")})` : ""}`,
    );
  }
  return entry.create(params);
};
