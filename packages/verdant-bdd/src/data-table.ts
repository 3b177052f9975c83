/**
 * Read-only view over a step's data table, handed to step functions through
 * `ctx.step.table()`.
 *
 * ```ts
 * // | name  | qty |
 * // | apple | 3   |
 * table.asObjects(); // → [{ name: 'apple', qty: '3' }]
 * ```
 */
export class DataTable {
	constructor(private readonly cells: readonly (readonly string[])[]) {}

	/** Every row, header included */
	raw(): string[][] {
		return this.cells.map((row) => [...row]);
	}

	headers(): string[] {
		return [...(this.cells[0] ?? [])];
	}

	/** Rows after the header */
	rows(): string[][] {
		return this.raw().slice(1);
	}

	/** One object per body row, keyed by the header cells. */
	asObjects(): Record<string, string>[] {
		const headers = this.headers();
		return this.rows().map((row) => {
			const entry: Record<string, string> = {};
			headers.forEach((key, i) => {
				entry[key] = row[i] ?? '';
			});
			return entry;
		});
	}

	/** First column as keys, second as values. Header row included. */
	asMap(): Map<string, string> {
		const map = new Map<string, string>();
		for (const [key, value] of this.cells) {
			if (key !== undefined) map.set(key, value ?? '');
		}
		return map;
	}

	get rowCount(): number {
		return this.cells.length;
	}
}
