import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { DataRequest, MarketBar } from "@daybook/sdk";

import type { BarLoader } from "./InstrumentFeed.js";
import { dedupeAndSort, filterBarsForRequest, sanitizeBar, slugify } from "./internalUtils.js";

const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");

interface CsvCachePayload {
  readonly mtimeMs: number;
  readonly bars: ReadonlyArray<MarketBar>;
}

export interface CsvSourceOptions {
  readonly datasetsDir?: string;
  readonly cacheDir?: string;
}

type BarField = "date" | "open" | "high" | "low" | "close" | "volume" | "amount" | "pctChange";

const HEADER_ALIASES: Readonly<Record<string, BarField>> = {
  date: "date",
  trade_date: "date",
  timestamp: "date",
  open: "open",
  high: "high",
  low: "low",
  close: "close",
  volume: "volume",
  amount: "amount",
  pct_change: "pctChange",
  change_ratio: "pctChange",
};

const REQUIRED_FIELDS: ReadonlyArray<BarField> = ["date", "open", "high", "low", "close", "volume"];

/**
 * CSV-backed loader reading `<instrument>.csv` files and caching the parsed bars as JSON.
 */
export class CsvSource implements BarLoader {
  public readonly id = "csv";

  private readonly datasetsDir: string;
  private readonly cacheDir: string;

  public constructor(options: CsvSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
    this.cacheDir = options.cacheDir ?? join(this.datasetsDir, ".cache");
  }

  public async loadBars(request: DataRequest): Promise<ReadonlyArray<MarketBar>> {
    const datasetPath = join(this.datasetsDir, `${slugify(request.instrumentId)}.csv`);

    let datasetStat: Awaited<ReturnType<typeof stat>>;
    try {
      datasetStat = await stat(datasetPath);
    } catch {
      return [];
    }

    const cachePath = join(this.cacheDir, `${slugify(request.instrumentId)}.json`);
    const cached = await this.readCache(cachePath, datasetStat.mtimeMs, request.instrumentId);
    if (cached) {
      return filterBarsForRequest(cached, request);
    }

    const content = await readFile(datasetPath, { encoding: "utf-8" });
    const parsed = parseCsv(content, request.instrumentId);

    await this.writeCache(cachePath, {
      mtimeMs: datasetStat.mtimeMs,
      bars: parsed,
    });

    return filterBarsForRequest(parsed, request);
  }

  private async readCache(
    cachePath: string,
    expectedMtimeMs: number,
    instrumentId: string,
  ): Promise<ReadonlyArray<MarketBar> | null> {
    let buffer: string;
    try {
      buffer = await readFile(cachePath, { encoding: "utf-8" });
    } catch {
      return null;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(buffer);
    } catch {
      // A corrupt cache is rebuilt from the CSV.
      return null;
    }
    if (payload === null || typeof payload !== "object") {
      return null;
    }
    const { mtimeMs, bars } = payload as Record<string, unknown>;
    if (mtimeMs !== expectedMtimeMs || !Array.isArray(bars)) {
      return null;
    }
    return bars
      .map(sanitizeBar)
      .filter((bar): bar is MarketBar => bar !== null && bar.instrumentId === instrumentId);
  }

  private async writeCache(cachePath: string, payload: CsvCachePayload): Promise<void> {
    await mkdir(this.cacheDir, { recursive: true });
    await writeFile(cachePath, JSON.stringify(payload), { encoding: "utf-8" });
  }
}

/**
 * Parses a header-led CSV into sorted, de-duplicated bars. Rows missing a required
 * column or holding a non-numeric price are skipped.
 */
export const parseCsv = (content: string, instrumentId: string): MarketBar[] => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const [header, ...rows] = lines;
  if (!header) {
    return [];
  }

  const columns = new Map<BarField, number>();
  header.split(",").forEach((name, index) => {
    const field = HEADER_ALIASES[name.trim().toLowerCase()];
    if (field && !columns.has(field)) {
      columns.set(field, index);
    }
  });
  if (REQUIRED_FIELDS.some((field) => !columns.has(field))) {
    throw new Error(
      `CSV for ${instrumentId} must have columns ${REQUIRED_FIELDS.join(", ")}; got "${header}"`,
    );
  }

  const bars: MarketBar[] = [];
  for (const row of rows) {
    const cells = row.split(",").map((part) => part.trim());
    const cell = (field: BarField): string | undefined => {
      const index = columns.get(field);
      return index === undefined ? undefined : cells[index];
    };
    const numeric = (field: BarField): number | undefined => {
      const raw = cell(field);
      return raw === undefined || raw.length === 0 ? undefined : Number(raw);
    };

    const bar = sanitizeBar({
      instrumentId,
      date: cell("date")?.slice(0, 10),
      open: numeric("open"),
      high: numeric("high"),
      low: numeric("low"),
      close: numeric("close"),
      volume: numeric("volume"),
      amount: numeric("amount"),
      pctChange: numeric("pctChange"),
    });
    if (bar) {
      bars.push(bar);
    }
  }

  return dedupeAndSort(bars);
};

/**
 * Factory used by callers to construct the CSV loader.
 */
export const createCsvSource = (options?: CsvSourceOptions): CsvSource => {
  return new CsvSource(options);
};

export { DEFAULT_DATASETS_DIR };
