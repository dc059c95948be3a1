/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

import * as scanner from './impl/scanner';
import * as parser from './impl/parser';
import * as generator from './impl/generator';
import * as value from './impl/value';
import * as projection from './impl/projection';
import * as sortedMap from './impl/sortedMap';
import type { ReadonlySortedMap } from './impl/sortedMap';

export type { ReadonlySortedMap };
export { SortedMap } from './impl/sortedMap';

/**
 * Creates a JSON scanner on the given text.
 */
export const createScanner: (text: string) => JSONScanner = scanner.createScanner;

export const enum SyntaxKind {
	Unknown,
	EOF,
	OpenBraceToken,
	CloseBraceToken,
	OpenBracketToken,
	CloseBracketToken,
	CommaToken,
	ColonToken,
	NullKeyword,
	TrueKeyword,
	FalseKeyword,
	StringLiteral,
	NumericLiteral
}

export function printSyntaxKind(code: SyntaxKind): string {
	switch (code) {
		case SyntaxKind.Unknown: return 'Unknown';
		case SyntaxKind.EOF: return 'EOF';
		case SyntaxKind.OpenBraceToken: return 'OpenBraceToken';
		case SyntaxKind.CloseBraceToken: return 'CloseBraceToken';
		case SyntaxKind.OpenBracketToken: return 'OpenBracketToken';
		case SyntaxKind.CloseBracketToken: return 'CloseBracketToken';
		case SyntaxKind.CommaToken: return 'CommaToken';
		case SyntaxKind.ColonToken: return 'ColonToken';
		case SyntaxKind.NullKeyword: return 'NullKeyword';
		case SyntaxKind.TrueKeyword: return 'TrueKeyword';
		case SyntaxKind.FalseKeyword: return 'FalseKeyword';
		case SyntaxKind.StringLiteral: return 'StringLiteral';
		case SyntaxKind.NumericLiteral: return 'NumericLiteral';
	}
}

/**
 * The scanner object, representing a JSON scanner at a position in the input string.
 * Malformed input makes `scan` throw a {@link JsonError}.
 */
export interface JSONScanner {
	/**
	 * Sets the scan position to a new offset. A call to 'scan' is needed to get the first token.
	 */
	setPosition(pos: number): void;
	/**
	 * Read the next token. Returns the token code, or `EOF` once only whitespace remains.
	 */
	scan(): SyntaxKind;
	/**
	 * Returns the current scan position, which is after the last read token.
	 */
	getPosition(): number;
	/**
	 * Returns the last read token.
	 */
	getToken(): SyntaxKind;
	/**
	 * Returns the last read token value. For strings this is the decoded string content, for
	 * every other token the source text of the token.
	 */
	getTokenValue(): string;
	/**
	 * Returns the numeric value of the last read `NumericLiteral`.
	 */
	getTokenNumber(): number;
	/**
	 * The start offset of the last read token.
	 */
	getTokenOffset(): number;
	/**
	 * The length of the last read token.
	 */
	getTokenLength(): number;
}

export const enum JsonErrorCode {
	UnexpectedToken,
	UnexpectedEndOfJson,
	UnexpectedCharacter,
	InvalidNumber,
	ParsingFailed,
	InvalidType,
	UndefinedField
}

export function printJsonErrorCode(code: JsonErrorCode): string {
	switch (code) {
		case JsonErrorCode.UnexpectedToken: return 'UnexpectedToken';
		case JsonErrorCode.UnexpectedEndOfJson: return 'UnexpectedEndOfJson';
		case JsonErrorCode.UnexpectedCharacter: return 'UnexpectedCharacter';
		case JsonErrorCode.InvalidNumber: return 'InvalidNumber';
		case JsonErrorCode.ParsingFailed: return 'ParsingFailed';
		case JsonErrorCode.InvalidType: return 'InvalidType';
		case JsonErrorCode.UndefinedField: return 'UndefinedField';
	}
}

/**
 * Raised by the scanner and parser on malformed input, and by the projection helpers
 * when a value does not have the requested shape.
 */
export class JsonError extends Error {
	readonly code: JsonErrorCode;
	/**
	 * The offending token, character, field name or decoding problem.
	 */
	readonly detail: string | undefined;
	/**
	 * Offset in the input text; undefined for errors raised on an already built value.
	 */
	readonly offset: number | undefined;

	constructor(code: JsonErrorCode, detail?: string, offset?: number) {
		let message = printJsonErrorCode(code);
		if (detail !== undefined) {
			message += ` (${detail})`;
		}
		if (offset !== undefined) {
			message += ` at offset ${offset}`;
		}
		super(message);
		this.name = 'JsonError';
		this.code = code;
		this.detail = detail;
		this.offset = offset;
	}
}

export type ValueType = 'null' | 'boolean' | 'string' | 'number' | 'array' | 'object';

export interface JsonNull {
	readonly type: 'null';
}

export interface JsonBoolean {
	readonly type: 'boolean';
	readonly value: boolean;
}

export interface JsonString {
	readonly type: 'string';
	readonly value: string;
}

export interface JsonNumber {
	readonly type: 'number';
	readonly value: number;
}

export interface JsonArray {
	readonly type: 'array';
	readonly items: readonly JsonValue[];
}

export interface JsonObject {
	readonly type: 'object';
	/**
	 * Iterates in ascending code point order of the keys, whatever order they were added in.
	 */
	readonly members: ReadonlySortedMap<JsonValue>;
}

export type JsonValue = JsonNull | JsonBoolean | JsonString | JsonNumber | JsonArray | JsonObject;

/**
 * Anything `stringify` and the value constructors accept: a value, a primitive, an array or a map.
 */
export type JsonConvertible =
	| JsonValue
	| null
	| boolean
	| number
	| string
	| readonly JsonConvertible[]
	| ReadonlyMap<string, JsonConvertible>;

export interface ParseOptions {
	/**
	 * Stop after the first complete value and ignore whatever follows it.
	 */
	allowTrailingContent?: boolean;
}

export type ParseSuccess = {
	kind: 'success';
	value: JsonValue;
};
export type ParseFailure = {
	kind: 'failure';
	error: JsonError;
};
export type ParseResult = ParseSuccess | ParseFailure;

export interface GeneratorOptions {
	/**
	 * Omit all whitespace between tokens. Defaults to false.
	 */
	minify?: boolean;
	/**
	 * Spaces per nesting level when not minifying. Defaults to 4.
	 */
	indentWidth?: number;
}

/**
 * Accumulates the text of the values written to it.
 */
export interface JSONGenerator {
	write(value: JsonValue): void;
	getText(): string;
}

/**
 * Parses exactly one JSON value from the given text or UTF-8 bytes. Throws a {@link JsonError}
 * on the first problem; unless `allowTrailingContent` is set, anything but whitespace after
 * the value is an error too.
 */
export const parse: (input: string | Uint8Array, options?: ParseOptions) => JsonValue = parser.parse;

/**
 * Like {@link parse}, but reports failures as a result instead of throwing.
 */
export const tryParse: (input: string | Uint8Array, options?: ParseOptions) => ParseResult = parser.tryParse;

/**
 * Arrays and objects nested deeper than this fail to parse with `ParsingFailed`.
 */
export const MAX_NESTING_DEPTH: number = parser.MAX_NESTING_DEPTH;

/**
 * Serializes to the minified form: no whitespace outside strings, object keys in sorted order.
 */
export const stringify: (input: JsonConvertible) => string = generator.stringify;

/**
 * Serializes to the indented form.
 */
export const prettyPrint: (input: JsonConvertible, indentWidth?: number) => string = generator.prettyPrint;

export const createGenerator: (options?: GeneratorOptions) => JSONGenerator = generator.createGenerator;

/**
 * The compact text of a value.
 */
export const dump: (json: JsonValue) => string = value.dump;

/**
 * Strings, numbers, booleans and null as bare text; arrays and objects as their compact text.
 */
export const display: (json: JsonValue) => string = value.display;

export const equals: (a: JsonValue, b: JsonValue) => boolean = value.equals;

export const toJsonValue: (input: JsonConvertible) => JsonValue = value.toJsonValue;
export const createNull: () => JsonNull = value.createNull;
export const createBoolean: (b: boolean) => JsonBoolean = value.createBoolean;
export const createNumber: (n: number) => JsonNumber = value.createNumber;
export const createString: (s: string) => JsonString = value.createString;
export const createArray: (items: Iterable<JsonConvertible>) => JsonArray = value.createArray;
export const createObject: (entries: Iterable<readonly [string, JsonConvertible]>) => JsonObject = value.createObject;

/**
 * Builds an array value from its elements: `array(1, 'two', [3])`.
 */
export const array: (...items: JsonConvertible[]) => JsonArray = value.array;

/**
 * Builds an object value from a record: `object({ name: 'abc', age: 123 })`.
 */
export const object: (members: { readonly [key: string]: JsonConvertible }) => JsonObject = value.object;

export const asBoolean: (json: JsonValue) => boolean = projection.asBoolean;
export const asNumber: (json: JsonValue) => number = projection.asNumber;
export const asString: (json: JsonValue) => string = projection.asString;
export const asArray: (json: JsonValue) => readonly JsonValue[] = projection.asArray;
export const asObject: (json: JsonValue) => ReadonlySortedMap<JsonValue> = projection.asObject;
export const isNull: (json: JsonValue) => boolean = projection.isNull;
export const getField: (json: JsonValue, key: string) => JsonValue = projection.getField;
export const getOptionalField: (json: JsonValue, key: string) => JsonValue | undefined = projection.getOptionalField;
export const getIndex: (json: JsonValue, index: number) => JsonValue = projection.getIndex;

/**
 * Orders object keys by Unicode code point, which matches the order of their UTF-8 bytes.
 */
export const compareKeys: (a: string, b: string) => number = sortedMap.compareKeys;
