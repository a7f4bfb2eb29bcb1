/**
 * JSON document store
 *
 * Backs the device registry and the topic mapping store. Each store is
 * one pretty-printed JSON file, replaced atomically on every write
 * (temp file in the same directory, then rename).
 */

import { promises as fs } from 'fs';
import { dirname, basename, join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { describeError, errnoCode } from '../errors';

export type LoadResult<T> =
	| { status: 'ok'; value: T }
	| { status: 'missing' }
	| { status: 'invalid'; error: string };

let tmpSequence = 0;

export class JsonFileStore<T> {
	constructor(
		public readonly path: string,
		private readonly schema: ZodType<T, ZodTypeDef, unknown>
	) {}

	/**
	 * Read and validate the document. Never throws for a missing or
	 * undecodable file; the caller decides how to report it.
	 */
	async read(): Promise<LoadResult<T>> {
		let text: string;
		try {
			text = await fs.readFile(this.path, 'utf-8');
		} catch (error) {
			if (errnoCode(error) === 'ENOENT') {
				return { status: 'missing' };
			}
			return { status: 'invalid', error: describeError(error) };
		}

		let raw: unknown;
		try {
			raw = JSON.parse(text);
		} catch (error) {
			return { status: 'invalid', error: describeError(error) };
		}

		const parsed = this.schema.safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const where = issue ? issue.path.join('.') : '';
			return {
				status: 'invalid',
				error: issue ? `${where || '<root>'}: ${issue.message}` : 'invalid document'
			};
		}
		return { status: 'ok', value: parsed.data };
	}

	async write(value: T): Promise<void> {
		const dir = dirname(this.path);
		const tmp = join(dir, `.${basename(this.path)}.${process.pid}.${++tmpSequence}.tmp`);
		await fs.mkdir(dir, { recursive: true });
		try {
			await fs.writeFile(tmp, JSON.stringify(value, null, 2), 'utf-8');
			await fs.rename(tmp, this.path);
		} catch (error) {
			await fs.rm(tmp, { force: true });
			throw error;
		}
	}
}
