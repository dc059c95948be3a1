/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

import { JsonError, JsonErrorCode, JSONScanner, SyntaxKind } from '../main';

const enum CharacterCode {
	tab = 0x09,
	lineFeed = 0x0a,
	carriageReturn = 0x0d,
	space = 0x20,
	doubleQuote = 0x22,
	plus = 0x2b,
	comma = 0x2c,
	minus = 0x2d,
	dot = 0x2e,
	slash = 0x2f,
	_0 = 0x30,
	_9 = 0x39,
	colon = 0x3a,
	A = 0x41,
	E = 0x45,
	F = 0x46,
	openBracket = 0x5b,
	backslash = 0x5c,
	closeBracket = 0x5d,
	a = 0x61,
	b = 0x62,
	e = 0x65,
	f = 0x66,
	n = 0x6e,
	r = 0x72,
	t = 0x74,
	u = 0x75,
	openBrace = 0x7b,
	closeBrace = 0x7d
}

// DecimalIntegerLiteral FractionPart(opt) ExponentPart(opt), with an optional leading minus
const numberPattern = /^-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?$/;

function isWhiteSpace(ch: number): boolean {
	return ch === CharacterCode.space || ch === CharacterCode.tab || ch === CharacterCode.lineFeed || ch === CharacterCode.carriageReturn;
}

function isDigit(ch: number): boolean {
	return ch >= CharacterCode._0 && ch <= CharacterCode._9;
}

function isHighSurrogate(codeUnit: number): boolean {
	return codeUnit >= 0xd800 && codeUnit <= 0xdbff;
}

function isLowSurrogate(codeUnit: number): boolean {
	return codeUnit >= 0xdc00 && codeUnit <= 0xdfff;
}

function printCodeUnit(codeUnit: number): string {
	return 'U+' + codeUnit.toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Creates a JSON scanner on the given text.
 */
export function createScanner(text: string): JSONScanner {

	const len = text.length;
	let pos = 0,
		value = '',
		numberValue = 0,
		tokenOffset = 0,
		token: SyntaxKind = SyntaxKind.Unknown;

	function setPosition(newPosition: number) {
		pos = newPosition;
		value = '';
		numberValue = 0;
		tokenOffset = 0;
		token = SyntaxKind.Unknown;
	}

	function unexpectedEnd(): JsonError {
		return new JsonError(JsonErrorCode.UnexpectedEndOfJson, undefined, len);
	}

	function unexpectedCharacter(offset: number): JsonError {
		const codePoint = text.codePointAt(offset) ?? text.charCodeAt(offset);
		return new JsonError(JsonErrorCode.UnexpectedCharacter, String.fromCodePoint(codePoint), offset);
	}

	function scanKeyword(keyword: string, kind: SyntaxKind): SyntaxKind {
		for (let i = 1; i < keyword.length; i++) {
			if (pos + i >= len) {
				throw unexpectedEnd();
			}
			if (text.charCodeAt(pos + i) !== keyword.charCodeAt(i)) {
				throw new JsonError(JsonErrorCode.UnexpectedToken, text.substring(pos, pos + i + 1), pos);
			}
		}
		pos += keyword.length;
		value = keyword;
		return token = kind;
	}

	function scanHexDigits(): number {
		let result = 0;
		for (let i = 0; i < 4; i++) {
			if (pos >= len) {
				throw unexpectedEnd();
			}
			const ch = text.charCodeAt(pos);
			let digit: number;
			if (ch >= CharacterCode._0 && ch <= CharacterCode._9) {
				digit = ch - CharacterCode._0;
			} else if (ch >= CharacterCode.a && ch <= CharacterCode.f) {
				digit = ch - CharacterCode.a + 10;
			} else if (ch >= CharacterCode.A && ch <= CharacterCode.F) {
				digit = ch - CharacterCode.A + 10;
			} else {
				throw unexpectedCharacter(pos);
			}
			result = result * 16 + digit;
			pos++;
		}
		return result;
	}

	// pos is just past the 'u' of the escape
	function scanUnicodeEscape(): string {
		const escapeOffset = pos - 2;
		const high = scanHexDigits();
		if (isLowSurrogate(high)) {
			throw new JsonError(JsonErrorCode.ParsingFailed, `unpaired surrogate ${printCodeUnit(high)}`, escapeOffset);
		}
		if (!isHighSurrogate(high)) {
			return String.fromCharCode(high);
		}
		for (const expected of [CharacterCode.backslash, CharacterCode.u]) {
			if (pos >= len) {
				throw unexpectedEnd();
			}
			if (text.charCodeAt(pos) !== expected) {
				throw new JsonError(JsonErrorCode.ParsingFailed, `unpaired surrogate ${printCodeUnit(high)}`, escapeOffset);
			}
			pos++;
		}
		const low = scanHexDigits();
		if (!isLowSurrogate(low)) {
			throw new JsonError(JsonErrorCode.ParsingFailed, `${printCodeUnit(high)} followed by ${printCodeUnit(low)}`, escapeOffset);
		}
		return String.fromCodePoint(((high - 0xd800) << 10) + (low - 0xdc00) + 0x10000);
	}

	// pos is just past the backslash
	function scanEscape(): string {
		if (pos >= len) {
			throw unexpectedEnd();
		}
		const ch = text.charCodeAt(pos++);
		switch (ch) {
			case CharacterCode.doubleQuote: return '"';
			case CharacterCode.backslash: return '\\';
			case CharacterCode.slash: return '/';
			case CharacterCode.b: return '\b';
			case CharacterCode.f: return '\f';
			case CharacterCode.n: return '\n';
			case CharacterCode.r: return '\r';
			case CharacterCode.t: return '\t';
			case CharacterCode.u: return scanUnicodeEscape();
		}
		throw unexpectedCharacter(pos - 1);
	}

	function scanString(): string {
		pos++;
		let result = '',
			start = pos;
		for (;;) {
			if (pos >= len) {
				throw unexpectedEnd();
			}
			const ch = text.charCodeAt(pos);
			if (ch === CharacterCode.doubleQuote) {
				result += text.substring(start, pos);
				pos++;
				return result;
			}
			if (ch === CharacterCode.backslash) {
				result += text.substring(start, pos);
				pos++;
				result += scanEscape();
				start = pos;
			} else {
				pos++;
			}
		}
	}

	function scanNumber(): number {
		const start = pos;
		let seenDot = false,
			seenExponent = false;
		pos++;
		while (pos < len) {
			const ch = text.charCodeAt(pos);
			if (isDigit(ch)) {
				pos++;
			} else if (ch === CharacterCode.dot) {
				if (seenDot) {
					throw new JsonError(JsonErrorCode.InvalidNumber, text.substring(start, pos + 1), start);
				}
				seenDot = true;
				pos++;
			} else if (ch === CharacterCode.e || ch === CharacterCode.E) {
				if (seenExponent) {
					throw new JsonError(JsonErrorCode.InvalidNumber, text.substring(start, pos + 1), start);
				}
				seenExponent = true;
				pos++;
				const sign = text.charCodeAt(pos);
				if (sign === CharacterCode.plus || sign === CharacterCode.minus) {
					pos++;
				}
			} else {
				break;
			}
		}
		const lexeme = text.substring(start, pos);
		const result = Number(lexeme);
		if (!numberPattern.test(lexeme) || !Number.isFinite(result)) {
			throw new JsonError(JsonErrorCode.InvalidNumber, lexeme, start);
		}
		return result;
	}

	function scanNext(): SyntaxKind {

		value = '';
		numberValue = 0;

		while (pos < len && isWhiteSpace(text.charCodeAt(pos))) {
			pos++;
		}
		tokenOffset = pos;

		if (pos >= len) {
			// at the end
			return token = SyntaxKind.EOF;
		}

		const code = text.charCodeAt(pos);
		switch (code) {
			// tokens: []{}:,
			case CharacterCode.openBrace:
				pos++;
				value = '{';
				return token = SyntaxKind.OpenBraceToken;
			case CharacterCode.closeBrace:
				pos++;
				value = '}';
				return token = SyntaxKind.CloseBraceToken;
			case CharacterCode.openBracket:
				pos++;
				value = '[';
				return token = SyntaxKind.OpenBracketToken;
			case CharacterCode.closeBracket:
				pos++;
				value = ']';
				return token = SyntaxKind.CloseBracketToken;
			case CharacterCode.colon:
				pos++;
				value = ':';
				return token = SyntaxKind.ColonToken;
			case CharacterCode.comma:
				pos++;
				value = ',';
				return token = SyntaxKind.CommaToken;

			// strings
			case CharacterCode.doubleQuote:
				value = scanString();
				return token = SyntaxKind.StringLiteral;

			// keywords: true, false, null
			case CharacterCode.t:
				return scanKeyword('true', SyntaxKind.TrueKeyword);
			case CharacterCode.f:
				return scanKeyword('false', SyntaxKind.FalseKeyword);
			case CharacterCode.n:
				return scanKeyword('null', SyntaxKind.NullKeyword);
		}

		// numbers
		if (code === CharacterCode.minus || isDigit(code)) {
			numberValue = scanNumber();
			value = text.substring(tokenOffset, pos);
			return token = SyntaxKind.NumericLiteral;
		}

		throw unexpectedCharacter(pos);
	}

	return {
		setPosition: setPosition,
		getPosition: () => pos,
		scan: scanNext,
		getToken: () => token,
		getTokenValue: () => value,
		getTokenNumber: () => numberValue,
		getTokenOffset: () => tokenOffset,
		getTokenLength: () => pos - tokenOffset
	};
}
