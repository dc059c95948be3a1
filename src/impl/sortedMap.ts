/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

export interface ReadonlySortedMap<V> extends Iterable<[string, V]> {
	readonly size: number;
	get(key: string): V | undefined;
	has(key: string): boolean;
	keys(): IterableIterator<string>;
	values(): IterableIterator<V>;
	entries(): IterableIterator<[string, V]>;
}

// Surrogates sort above the rest of the BMP once code units are compared as code points.
function codePointRank(codeUnit: number): number {
	if (codeUnit < 0xd800) {
		return codeUnit;
	}
	return codeUnit >= 0xe000 ? codeUnit - 0x800 : codeUnit + 0x2000;
}

export function compareKeys(a: string, b: string): number {
	const length = Math.min(a.length, b.length);
	for (let i = 0; i < length; i++) {
		const x = a.charCodeAt(i);
		const y = b.charCodeAt(i);
		if (x !== y) {
			return codePointRank(x) - codePointRank(y);
		}
	}
	return a.length - b.length;
}

/**
 * A string-keyed map kept sorted on insertion, so iteration never needs a separate sort step.
 */
export class SortedMap<V> implements ReadonlySortedMap<V> {
	private readonly sortedKeys: string[] = [];
	private readonly sortedValues: V[] = [];

	constructor(entries?: Iterable<readonly [string, V]>) {
		if (entries) {
			for (const [key, value] of entries) {
				this.set(key, value);
			}
		}
	}

	get size(): number {
		return this.sortedKeys.length;
	}

	/**
	 * Binary search. A miss returns the bitwise complement of the insertion point.
	 */
	private indexOf(key: string): number {
		let low = 0;
		let high = this.sortedKeys.length - 1;
		while (low <= high) {
			const middle = (low + high) >>> 1;
			const comparison = compareKeys(this.sortedKeys[middle], key);
			if (comparison < 0) {
				low = middle + 1;
			} else if (comparison > 0) {
				high = middle - 1;
			} else {
				return middle;
			}
		}
		return ~low;
	}

	get(key: string): V | undefined {
		const index = this.indexOf(key);
		return index >= 0 ? this.sortedValues[index] : undefined;
	}

	has(key: string): boolean {
		return this.indexOf(key) >= 0;
	}

	/**
	 * Replaces the value of an existing key in place.
	 */
	set(key: string, value: V): this {
		const index = this.indexOf(key);
		if (index >= 0) {
			this.sortedValues[index] = value;
		} else {
			this.sortedKeys.splice(~index, 0, key);
			this.sortedValues.splice(~index, 0, value);
		}
		return this;
	}

	delete(key: string): boolean {
		const index = this.indexOf(key);
		if (index < 0) {
			return false;
		}
		this.sortedKeys.splice(index, 1);
		this.sortedValues.splice(index, 1);
		return true;
	}

	*keys(): IterableIterator<string> {
		yield* this.sortedKeys;
	}

	*values(): IterableIterator<V> {
		yield* this.sortedValues;
	}

	*entries(): IterableIterator<[string, V]> {
		for (let i = 0; i < this.sortedKeys.length; i++) {
			yield [this.sortedKeys[i], this.sortedValues[i]];
		}
	}

	[Symbol.iterator](): IterableIterator<[string, V]> {
		return this.entries();
	}
}
