/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

import { GeneratorOptions, JSONGenerator, JsonConvertible, JsonValue } from '../main';
import { ReadonlySortedMap } from './sortedMap';
import { toJsonValue } from './value';

export const DEFAULT_INDENT_WIDTH = 4;

const enum Indent {
	Right,
	Left,
	Stay
}

function escapeCharacter(code: number): string | undefined {
	switch (code) {
		case 0x22: return '\\"';
		case 0x5c: return '\\\\';
		case 0x0a: return '\\n';
		case 0x0d: return '\\r';
		case 0x09: return '\\t';
		case 0x0c: return '\\f';
		case 0x08: return '\\b';
	}
	return undefined;
}

/**
 * Quotes a string. Only the quote, the backslash and the five short-form control characters
 * are escaped; everything else, non-ASCII included, is written as is.
 */
export function quote(text: string): string {
	let result = '"';
	let start = 0;
	for (let i = 0; i < text.length; i++) {
		const escaped = escapeCharacter(text.charCodeAt(i));
		if (escaped !== undefined) {
			result += text.substring(start, i) + escaped;
			start = i + 1;
		}
	}
	return result + text.substring(start) + '"';
}

// Moves the decimal point of an exponent-form mantissa, e.g. ('1.5', -7) to '0.00000015'.
function expandExponent(mantissa: string, exponent: number): string {
	const negative = mantissa.charCodeAt(0) === 0x2d;
	const unsigned = negative ? mantissa.substring(1) : mantissa;
	const point = unsigned.indexOf('.');
	const digits = point < 0 ? unsigned : unsigned.substring(0, point) + unsigned.substring(point + 1);
	const integerLength = (point < 0 ? unsigned.length : point) + exponent;
	let result: string;
	if (integerLength <= 0) {
		result = '0.' + '0'.repeat(-integerLength) + digits;
	} else if (integerLength >= digits.length) {
		result = digits + '0'.repeat(integerLength - digits.length);
	} else {
		result = digits.substring(0, integerLength) + '.' + digits.substring(integerLength);
	}
	return negative ? '-' + result : result;
}

/**
 * Shortest round-tripping digits, always in plain decimal notation. JSON has no literal
 * for NaN or the infinities, so they are written as null.
 */
export function formatNumber(n: number): string {
	if (!Number.isFinite(n)) {
		return 'null';
	}
	const text = String(n);
	const exponentIndex = text.indexOf('e');
	if (exponentIndex < 0) {
		return text;
	}
	return expandExponent(text.substring(0, exponentIndex), Number(text.substring(exponentIndex + 1)));
}

function normalizeIndentWidth(indentWidth: number | undefined): number {
	if (indentWidth === undefined || !Number.isFinite(indentWidth)) {
		return DEFAULT_INDENT_WIDTH;
	}
	return Math.max(0, Math.floor(indentWidth));
}

export function createGenerator(options: GeneratorOptions = {}): JSONGenerator {
	const minify = options.minify ?? false;
	const indentWidth = normalizeIndentWidth(options.indentWidth);
	let text = '';
	let depth = 0;

	function newLine(indent: Indent): void {
		switch (indent) {
			case Indent.Right:
				depth++;
				break;
			case Indent.Left:
				if (depth > 0) {
					depth--;
				}
				break;
			case Indent.Stay:
				break;
		}
		if (!minify) {
			text += '\n' + ' '.repeat(depth * indentWidth);
		}
	}

	function writeArray(items: readonly JsonValue[]): void {
		if (items.length === 0) {
			text += '[]';
			return;
		}
		text += '[';
		items.forEach((item, index) => {
			if (index === 0) {
				newLine(Indent.Right);
			} else {
				text += minify ? ',' : ', ';
				newLine(Indent.Stay);
			}
			writeValue(item);
		});
		newLine(Indent.Left);
		text += ']';
	}

	function writeObject(members: ReadonlySortedMap<JsonValue>): void {
		if (members.size === 0) {
			text += '{}';
			return;
		}
		text += '{';
		let first = true;
		for (const [key, member] of members) {
			if (first) {
				first = false;
				newLine(Indent.Right);
			} else {
				text += ',';
				newLine(Indent.Stay);
			}
			text += quote(key) + (minify ? ':' : ': ');
			writeValue(member);
		}
		newLine(Indent.Left);
		text += '}';
	}

	function writeValue(json: JsonValue): void {
		switch (json.type) {
			case 'null':
				text += 'null';
				break;
			case 'boolean':
				text += json.value ? 'true' : 'false';
				break;
			case 'number':
				text += formatNumber(json.value);
				break;
			case 'string':
				text += quote(json.value);
				break;
			case 'array':
				writeArray(json.items);
				break;
			case 'object':
				writeObject(json.members);
				break;
		}
	}

	return {
		write: writeValue,
		getText: () => text
	};
}

export function stringify(input: JsonConvertible): string {
	const generator = createGenerator({ minify: true });
	generator.write(toJsonValue(input));
	return generator.getText();
}

export function prettyPrint(input: JsonConvertible, indentWidth: number = DEFAULT_INDENT_WIDTH): string {
	const generator = createGenerator({ minify: false, indentWidth });
	generator.write(toJsonValue(input));
	return generator.getText();
}
