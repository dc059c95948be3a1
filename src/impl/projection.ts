/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

import { JsonError, JsonErrorCode, JsonValue, ValueType } from '../main';
import { ReadonlySortedMap } from './sortedMap';

function invalidType(expected: ValueType, json: JsonValue): JsonError {
	return new JsonError(JsonErrorCode.InvalidType, `expected ${expected}, found ${json.type}`);
}

export function asBoolean(json: JsonValue): boolean {
	if (json.type !== 'boolean') {
		throw invalidType('boolean', json);
	}
	return json.value;
}

export function asNumber(json: JsonValue): number {
	if (json.type !== 'number') {
		throw invalidType('number', json);
	}
	return json.value;
}

export function asString(json: JsonValue): string {
	if (json.type !== 'string') {
		throw invalidType('string', json);
	}
	return json.value;
}

export function asArray(json: JsonValue): readonly JsonValue[] {
	if (json.type !== 'array') {
		throw invalidType('array', json);
	}
	return json.items;
}

export function asObject(json: JsonValue): ReadonlySortedMap<JsonValue> {
	if (json.type !== 'object') {
		throw invalidType('object', json);
	}
	return json.members;
}

export function isNull(json: JsonValue): boolean {
	return json.type === 'null';
}

export function getOptionalField(json: JsonValue, key: string): JsonValue | undefined {
	return asObject(json).get(key);
}

export function getField(json: JsonValue, key: string): JsonValue {
	const field = getOptionalField(json, key);
	if (field === undefined) {
		throw new JsonError(JsonErrorCode.UndefinedField, key);
	}
	return field;
}

export function getIndex(json: JsonValue, index: number): JsonValue {
	const items = asArray(json);
	if (!Number.isInteger(index) || index < 0 || index >= items.length) {
		throw new JsonError(JsonErrorCode.UndefinedField, `[${index}]`);
	}
	return items[index];
}
