/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

import { TextDecoder } from 'util';
import {
	JsonArray,
	JsonError,
	JsonErrorCode,
	JsonObject,
	JsonValue,
	ParseOptions,
	ParseResult,
	printSyntaxKind,
	SyntaxKind
} from '../main';
import { createScanner } from './scanner';
import { SortedMap } from './sortedMap';
import { createBoolean, createNull, createNumber, createString } from './value';

/**
 * Deepest nesting of arrays and objects a document may have.
 */
export const MAX_NESTING_DEPTH = 1000;

const defaultOptions: ParseOptions = {
	allowTrailingContent: false
};

function decodeUtf8(bytes: Uint8Array): string {
	try {
		return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
	} catch {
		throw new JsonError(JsonErrorCode.ParsingFailed, 'invalid UTF-8');
	}
}

/**
 * Parses the given text or UTF-8 bytes and returns the value it represents.
 * The first problem found aborts the parse with a JsonError.
 */
export function parse(input: string | Uint8Array, options: ParseOptions = defaultOptions): JsonValue {
	const _scanner = createScanner(typeof input === 'string' ? input : decodeUtf8(input));
	let depth = 0;

	function scanNext(): SyntaxKind {
		return _scanner.scan();
	}

	function describeToken(): string {
		const token = _scanner.getToken();
		switch (token) {
			case SyntaxKind.StringLiteral:
			case SyntaxKind.NumericLiteral:
				return `${printSyntaxKind(token)}(${_scanner.getTokenValue()})`;
			default:
				return printSyntaxKind(token);
		}
	}

	function unexpectedToken(): JsonError {
		if (_scanner.getToken() === SyntaxKind.EOF) {
			return new JsonError(JsonErrorCode.UnexpectedEndOfJson, undefined, _scanner.getTokenOffset());
		}
		return new JsonError(JsonErrorCode.UnexpectedToken, describeToken(), _scanner.getTokenOffset());
	}

	function enterContainer(): void {
		if (++depth > MAX_NESTING_DEPTH) {
			throw new JsonError(JsonErrorCode.ParsingFailed, 'nesting too deep', _scanner.getTokenOffset());
		}
	}

	// Each parse function starts on the first token of its value and stops on the last one.
	function parseValue(): JsonValue {
		switch (_scanner.getToken()) {
			case SyntaxKind.NullKeyword:
				return createNull();
			case SyntaxKind.TrueKeyword:
				return createBoolean(true);
			case SyntaxKind.FalseKeyword:
				return createBoolean(false);
			case SyntaxKind.NumericLiteral:
				return createNumber(_scanner.getTokenNumber());
			case SyntaxKind.StringLiteral:
				return createString(_scanner.getTokenValue());
			case SyntaxKind.OpenBraceToken:
				return parseObject();
			case SyntaxKind.OpenBracketToken:
				return parseArray();
			default:
				throw unexpectedToken();
		}
	}

	function parseProperty(members: SortedMap<JsonValue>): void {
		if (_scanner.getToken() !== SyntaxKind.StringLiteral) {
			throw unexpectedToken();
		}
		const key = _scanner.getTokenValue();
		if (scanNext() !== SyntaxKind.ColonToken) {
			throw unexpectedToken();
		}
		scanNext();
		// a repeated key replaces the earlier value
		members.set(key, parseValue());
	}

	function parseObject(): JsonObject {
		enterContainer();
		const members = new SortedMap<JsonValue>();
		if (scanNext() !== SyntaxKind.CloseBraceToken) {
			parseProperty(members);
			for (;;) {
				const token = scanNext();
				if (token === SyntaxKind.CloseBraceToken) {
					break;
				}
				if (token !== SyntaxKind.CommaToken) {
					throw unexpectedToken();
				}
				scanNext();
				parseProperty(members);
			}
		}
		depth--;
		return { type: 'object', members };
	}

	function parseArray(): JsonArray {
		enterContainer();
		const items: JsonValue[] = [];
		if (scanNext() !== SyntaxKind.CloseBracketToken) {
			items.push(parseValue());
			for (;;) {
				const token = scanNext();
				if (token === SyntaxKind.CloseBracketToken) {
					break;
				}
				if (token !== SyntaxKind.CommaToken) {
					throw unexpectedToken();
				}
				scanNext();
				items.push(parseValue());
			}
		}
		depth--;
		return { type: 'array', items };
	}

	scanNext();
	const result = parseValue();
	if (!options.allowTrailingContent && scanNext() !== SyntaxKind.EOF) {
		throw unexpectedToken();
	}
	return result;
}

export function tryParse(input: string | Uint8Array, options?: ParseOptions): ParseResult {
	try {
		return { kind: 'success', value: parse(input, options) };
	} catch (error) {
		if (error instanceof JsonError) {
			return { kind: 'failure', error };
		}
		throw error;
	}
}
