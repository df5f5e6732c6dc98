/**
 * FileLineSink: appends lines to a text file through a serialized write queue.
 *
 * `write` returns immediately; appends run one at a time in call order. A
 * failed append is recorded and logged, and later lines are still attempted.
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { SinkWriteError, classifyError } from "../shared/errors.js";
import type { LineSink } from "./line-sink.js";

const MAX_RECORDED_ERRORS = 10;

export interface FileLineSinkConfig {
	readonly filePath: string;
	/** Start from an empty file instead of appending to an existing one */
	readonly truncate?: boolean;
	readonly logger?: Logger;
}

export class FileLineSink implements LineSink {
	private readonly filePath: string;
	private readonly logger: Logger;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly _writeErrors: SinkWriteError[] = [];

	private constructor(filePath: string, logger: Logger) {
		this.filePath = filePath;
		this.logger = logger;
	}

	/**
	 * Creates the parent directory and, when asked, empties the file.
	 * @throws SinkWriteError if the file cannot be prepared
	 */
	static async open(config: FileLineSinkConfig): Promise<FileLineSink> {
		const logger = (config.logger ?? silentLogger).child({ sink: config.filePath });
		try {
			await mkdir(dirname(config.filePath), { recursive: true });
			if (config.truncate === true) {
				await writeFile(config.filePath, "", "utf-8");
			}
		} catch (error: unknown) {
			throw new SinkWriteError(`Cannot open ${config.filePath}`, {
				cause: error,
				filePath: config.filePath,
			});
		}
		return new FileLineSink(config.filePath, logger);
	}

	write(line: string): void {
		this.writeQueue = this.writeQueue.then(() => this.appendOnce(`${line}\n`));
	}

	/** Waits for every queued append to settle. */
	async flush(): Promise<void> {
		await this.writeQueue;
	}

	/** The most recent append failures, oldest first. */
	writeErrors(): readonly SinkWriteError[] {
		return this._writeErrors;
	}

	get path(): string {
		return this.filePath;
	}

	private async appendOnce(text: string): Promise<void> {
		try {
			await appendFile(this.filePath, text, "utf-8");
		} catch (error: unknown) {
			const classified = classifyError(error);
			const failure = new SinkWriteError(
				`Append to ${this.filePath} failed: ${classified.message}`,
				{ cause: error, filePath: this.filePath, code: classified.code },
			);
			this._writeErrors.push(failure);
			if (this._writeErrors.length > MAX_RECORDED_ERRORS) {
				this._writeErrors.shift();
			}
			this.logger.warn({ err: failure }, "Sink write failed");
		}
	}
}
