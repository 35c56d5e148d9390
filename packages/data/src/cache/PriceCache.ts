import fs from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import type { PriceSeries, RawRow } from "@gold-rotation/core";
import { writeFileAtomic } from "@gold-rotation/persistence";
import { normalizePrices } from "../normalize/normalizePrices";

export const CACHE_HEADER = [
	"Date",
	"Open",
	"High",
	"Low",
	"Close",
	"Volume",
	"Symbol",
] as const;

export interface PriceCacheOptions {
	/** Directory holding one CSV snapshot per cached symbol. */
	directory: string;
}

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

export const formatCacheCsv = (series: PriceSeries): string =>
	Papa.unparse(
		{
			fields: [...CACHE_HEADER],
			data: series.map((bar) => [
				bar.date,
				bar.open,
				bar.high,
				bar.low,
				bar.close,
				bar.volume,
				bar.symbol,
			]),
		},
		{ newline: "\n" }
	);

/** Every cache column present and non-blank; an interrupted write leaves a short last row. */
const isCompleteRow = (row: RawRow): boolean =>
	CACHE_HEADER.every((column) => {
		const value = row[column];
		return typeof value === "string" && value.trim().length > 0;
	});

/**
 * On-disk snapshot of a normalized series. Each successful refresh replaces
 * the whole file; reads go back through the normalizer so a truncated trailing
 * row from an interrupted writer is dropped instead of surfacing.
 */
export class PriceCache {
	constructor(private readonly options: PriceCacheOptions) {
		if (!options.directory) {
			throw new Error("PriceCache directory is required");
		}
	}

	pathFor(symbol: string): string {
		const safe = symbol.replace(/[^A-Za-z0-9._-]/g, "_");
		return path.join(this.options.directory, `${safe}.csv`);
	}

	async exists(symbol: string): Promise<boolean> {
		try {
			await fs.access(this.pathFor(symbol));
			return true;
		} catch (error) {
			if (isMissingFile(error)) {
				return false;
			}
			throw error;
		}
	}

	/**
	 * @returns the cached series, or null when no snapshot exists
	 * @throws EmptyDataError or SchemaError when the file is unusable
	 */
	async read(symbol: string): Promise<PriceSeries | null> {
		let text: string;
		try {
			text = await fs.readFile(this.pathFor(symbol), "utf-8");
		} catch (error) {
			if (isMissingFile(error)) {
				return null;
			}
			throw error;
		}
		const parsed = Papa.parse<RawRow>(text, {
			header: true,
			skipEmptyLines: true,
		});
		return normalizePrices(parsed.data.filter(isCompleteRow), symbol);
	}

	async write(symbol: string, series: PriceSeries): Promise<string> {
		const target = this.pathFor(symbol);
		await writeFileAtomic(target, formatCacheCsv(series));
		return target;
	}
}
