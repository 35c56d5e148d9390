/**
 * File persistence for cache snapshots and backtest tables. Writes go to a
 * sibling temp file first and are renamed into place, so a reader never
 * observes a half-written file from this process.
 */
import fs from "node:fs/promises";
import path from "node:path";

export interface PersistenceOptions {
	outputDir: string;
}

export interface PersistenceLayer {
	readonly outputDir: string;
	saveTable(fileName: string, contents: string): Promise<string>;
}

let tempCounter = 0;

export const writeFileAtomic = async (
	filePath: string,
	contents: string
): Promise<void> => {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	tempCounter += 1;
	const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`;
	try {
		await fs.writeFile(tempPath, contents, "utf-8");
		await fs.rename(tempPath, filePath);
	} catch (error) {
		await fs.rm(tempPath, { force: true });
		throw error;
	}
};

export const createPersistenceLayer = (
	options: PersistenceOptions
): PersistenceLayer => ({
	outputDir: options.outputDir,
	async saveTable(fileName: string, contents: string): Promise<string> {
		if (!fileName || fileName !== path.basename(fileName)) {
			throw new Error(`Table name must be a bare file name: ${fileName}`);
		}
		const target = path.join(options.outputDir, fileName);
		await writeFileAtomic(target, contents);
		return target;
	},
});
