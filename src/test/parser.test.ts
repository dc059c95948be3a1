/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

import * as assert from 'assert';
import {
	JsonError,
	JsonErrorCode,
	JsonValue,
	MAX_NESTING_DEPTH,
	ParseOptions,
	array,
	asArray,
	asObject,
	createBoolean,
	createNull,
	createNumber,
	createString,
	dump,
	equals,
	object,
	parse,
	printJsonErrorCode,
	tryParse,
} from '../main';
import JSON5 = require('json5');

function assertValidParse(input: string | Uint8Array, expected: JsonValue, options?: ParseOptions): void {
	const actual = parse(input, options);
	assert.ok(equals(actual, expected), `parse result of ${JSON5.stringify(String(input))} was ${dump(actual)}, expected ${dump(expected)}`);
}

function assertInvalidParse(input: string | Uint8Array, code: JsonErrorCode, offset?: number, detail?: string): void {
	assert.throws(() => parse(input), (error: unknown) => {
		if (!(error instanceof JsonError)) {
			return false;
		}
		assert.strictEqual(printJsonErrorCode(error.code), printJsonErrorCode(code), `error was not correct for ${JSON5.stringify(String(input))}: ${error.message}`);
		assert.strictEqual(error.offset, offset, `offset was not correct for ${JSON5.stringify(String(input))}`);
		if (detail !== undefined) {
			assert.strictEqual(error.detail, detail);
		}
		return true;
	});
}

suite('Parser', () => {
	test('parse: literals', () => {
		assertValidParse('true', createBoolean(true));
		assertValidParse('false', createBoolean(false));
		assertValidParse('null', createNull());
		assertValidParse(' 1234 ', createNumber(1234));
		assertValidParse('-1.23e+4', createNumber(-12300));
		assertValidParse('"abc  d "', createString('abc  d '));
		assertValidParse(String.raw`"\u67e5\u8be2"`, createString('\u67e5\u8be2'));
		assertValidParse(String.raw` "\uD834\uDD1E" `, createString('\u{1d11e}'));
		assertValidParse(String.raw`"myname \n"`, createString('myname \n'));
	});

	test('parse: objects', () => {
		assertValidParse('{}', object({}));
		assertValidParse('{"name": "abc", "age": 123}', object({ name: 'abc', age: 123 }));
		assertValidParse('{ "foo": [1, 2, 3] }', object({ foo: [1, 2, 3] }));
		assertValidParse('{"a": {"b": {"c": null}}, "d": false}', object({ a: object({ b: object({ c: null }) }), d: false }));
		assertValidParse('\n\t{\r\n"x" :\t1 }\n', object({ x: 1 }));
	});

	test('parse: object keys are sorted', () => {
		const members = asObject(parse('{"success": true, "code": 200, "payload": {}}'));
		assert.deepStrictEqual(Array.from(members.keys()), ['code', 'payload', 'success']);
	});

	test('parse: duplicate keys', () => {
		const parsed = parse('{"a": 1, "b": 2, "a": 3}');
		assertValidParse('{"a": 1, "b": 2, "a": 3}', object({ a: 3, b: 2 }));
		assert.strictEqual(asObject(parsed).size, 2);
	});

	test('parse: arrays', () => {
		assertValidParse('[]', array());
		assertValidParse('[[]]', array([]));
		assertValidParse('[1,2 , "a",3]', array(1, 2, 'a', 3));
		assertValidParse('[1, "foo", [3, 4]]', array(1, 'foo', [3, 4]));
		assertValidParse('[true, null, {"a": []}]', array(true, null, object({ a: [] })));
	});

	test('parse: structural errors', () => {
		assertInvalidParse('{"a":1,}', JsonErrorCode.UnexpectedToken, 7, 'CloseBraceToken');
		assertInvalidParse('[1,]', JsonErrorCode.UnexpectedToken, 3, 'CloseBracketToken');
		assertInvalidParse('[1 2]', JsonErrorCode.UnexpectedToken, 3, 'NumericLiteral(2)');
		assertInvalidParse('{1:2}', JsonErrorCode.UnexpectedToken, 1, 'NumericLiteral(1)');
		assertInvalidParse('{"a" 1}', JsonErrorCode.UnexpectedToken, 5, 'NumericLiteral(1)');
		assertInvalidParse('{"a":1 "b":2}', JsonErrorCode.UnexpectedToken, 7, 'StringLiteral(b)');
		assertInvalidParse('{"a":1]', JsonErrorCode.UnexpectedToken, 6, 'CloseBracketToken');
		assertInvalidParse('[1}', JsonErrorCode.UnexpectedToken, 2, 'CloseBraceToken');
		assertInvalidParse(':', JsonErrorCode.UnexpectedToken, 0, 'ColonToken');
		assertInvalidParse(']', JsonErrorCode.UnexpectedToken, 0, 'CloseBracketToken');
		assertInvalidParse('[,1]', JsonErrorCode.UnexpectedToken, 1, 'CommaToken');
	});

	test('parse: unexpected end', () => {
		assertInvalidParse('', JsonErrorCode.UnexpectedEndOfJson, 0);
		assertInvalidParse('   ', JsonErrorCode.UnexpectedEndOfJson, 3);
		assertInvalidParse('{', JsonErrorCode.UnexpectedEndOfJson, 1);
		assertInvalidParse('[1,', JsonErrorCode.UnexpectedEndOfJson, 3);
		assertInvalidParse('{"a":', JsonErrorCode.UnexpectedEndOfJson, 5);
		assertInvalidParse('{"a"', JsonErrorCode.UnexpectedEndOfJson, 4);
		assertInvalidParse('"abc', JsonErrorCode.UnexpectedEndOfJson, 4);
		assertInvalidParse('[tr', JsonErrorCode.UnexpectedEndOfJson, 3);
	});

	test('parse: lexical errors propagate', () => {
		assertInvalidParse('[1.23.4]', JsonErrorCode.InvalidNumber, 1);
		assertInvalidParse('{"a": tru}', JsonErrorCode.UnexpectedToken, 6, 'tru}');
		assertInvalidParse('{"a": x}', JsonErrorCode.UnexpectedCharacter, 6, 'x');
		assertInvalidParse(String.raw`["\uDD1E"]`, JsonErrorCode.ParsingFailed, 2);
	});

	test('parse: trailing content', () => {
		assertInvalidParse('1 2', JsonErrorCode.UnexpectedToken, 2, 'NumericLiteral(2)');
		assertInvalidParse('{} x', JsonErrorCode.UnexpectedCharacter, 3, 'x');
		assertInvalidParse('[]]', JsonErrorCode.UnexpectedToken, 2, 'CloseBracketToken');
		assertValidParse('[] \r\n', array());

		assertValidParse('1 2', createNumber(1), { allowTrailingContent: true });
		assertValidParse('{"a":1} }', object({ a: 1 }), { allowTrailingContent: true });
		assertValidParse('null x', createNull(), { allowTrailingContent: true });
	});

	test('parse: bytes', () => {
		assertValidParse(Buffer.from('{"\u00e9": "\u{1d11e}"}', 'utf8'), object({ '\u00e9': '\u{1d11e}' }));
		assertValidParse(new Uint8Array([0xef, 0xbb, 0xbf, 0x31]), createNumber(1));
		assertInvalidParse(new Uint8Array([0x22, 0xff, 0x22]), JsonErrorCode.ParsingFailed, undefined, 'invalid UTF-8');
		assertInvalidParse(new Uint8Array([0x5b, 0x31, 0x2c]), JsonErrorCode.UnexpectedEndOfJson, 3);
	});

	test('parse: nesting depth', () => {
		const deepest = '['.repeat(MAX_NESTING_DEPTH) + ']'.repeat(MAX_NESTING_DEPTH);
		assert.strictEqual(asArray(parse(deepest)).length, 1);
		assertInvalidParse('['.repeat(MAX_NESTING_DEPTH + 1) + ']'.repeat(MAX_NESTING_DEPTH + 1), JsonErrorCode.ParsingFailed, MAX_NESTING_DEPTH, 'nesting too deep');
		assertInvalidParse('{"a":'.repeat(MAX_NESTING_DEPTH + 1) + '1' + '}'.repeat(MAX_NESTING_DEPTH + 1), JsonErrorCode.ParsingFailed, MAX_NESTING_DEPTH * 5, 'nesting too deep');

		const failure = tryParse('['.repeat(20000) + ']'.repeat(20000));
		assert.strictEqual(failure.kind, 'failure');
		if (failure.kind === 'failure') {
			assert.strictEqual(failure.error.code, JsonErrorCode.ParsingFailed);
			assert.strictEqual(failure.error.offset, MAX_NESTING_DEPTH);
		}
	});

		test('tryParse', () => {
		const success = tryParse('[1]');
		assert.strictEqual(success.kind, 'success');
		if (success.kind === 'success') {
			assert.strictEqual(dump(success.value), '[1]');
		}

		const failure = tryParse('{"a":1,}');
		assert.strictEqual(failure.kind, 'failure');
		if (failure.kind === 'failure') {
			assert.strictEqual(failure.error.code, JsonErrorCode.UnexpectedToken);
			assert.strictEqual(failure.error.message, 'UnexpectedToken (CloseBraceToken) at offset 7');
		}

		const lenient = tryParse('1 2', { allowTrailingContent: true });
		assert.strictEqual(lenient.kind, 'success');
	});
});
