/*---------------------------------------------------------------------------------------------
 *  Copyright (c) Microsoft Corporation. All rights reserved.
 *  Licensed under the MIT License. See License.txt in the project root for license information.
 *--------------------------------------------------------------------------------------------*/
'use strict';

import {
	JsonArray,
	JsonBoolean,
	JsonConvertible,
	JsonNull,
	JsonNumber,
	JsonObject,
	JsonString,
	JsonValue
} from '../main';
import { formatNumber, stringify } from './generator';
import { SortedMap } from './sortedMap';

const nullValue: JsonNull = { type: 'null' };
const trueValue: JsonBoolean = { type: 'boolean', value: true };
const falseValue: JsonBoolean = { type: 'boolean', value: false };

export function createNull(): JsonNull {
	return nullValue;
}

export function createBoolean(b: boolean): JsonBoolean {
	return b ? trueValue : falseValue;
}

export function createNumber(n: number): JsonNumber {
	return { type: 'number', value: n };
}

export function createString(s: string): JsonString {
	return { type: 'string', value: s };
}

export function createArray(items: Iterable<JsonConvertible>): JsonArray {
	const converted: JsonValue[] = [];
	for (const item of items) {
		converted.push(toJsonValue(item));
	}
	return { type: 'array', items: converted };
}

/**
 * Later entries win over earlier ones with the same key.
 */
export function createObject(entries: Iterable<readonly [string, JsonConvertible]>): JsonObject {
	const members = new SortedMap<JsonValue>();
	for (const [key, member] of entries) {
		members.set(key, toJsonValue(member));
	}
	return { type: 'object', members };
}

export function array(...items: JsonConvertible[]): JsonArray {
	return createArray(items);
}

export function object(members: { readonly [key: string]: JsonConvertible }): JsonObject {
	return createObject(Object.entries(members));
}

function isConvertibleArray(input: JsonConvertible): input is readonly JsonConvertible[] {
	return Array.isArray(input);
}

// Every value carries a type tag, so any other object is a map.
function isConvertibleMap(input: JsonConvertible): input is ReadonlyMap<string, JsonConvertible> {
	return typeof input === 'object' && input !== null && !Array.isArray(input) && !('type' in input);
}

export function toJsonValue(input: JsonConvertible): JsonValue {
	if (input === null) {
		return nullValue;
	}
	if (typeof input === 'boolean') {
		return createBoolean(input);
	}
	if (typeof input === 'number') {
		return createNumber(input);
	}
	if (typeof input === 'string') {
		return createString(input);
	}
	if (isConvertibleArray(input)) {
		return createArray(input);
	}
	if (isConvertibleMap(input)) {
		return createObject(input);
	}
	return input;
}

export function dump(json: JsonValue): string {
	return stringify(json);
}

export function display(json: JsonValue): string {
	switch (json.type) {
		case 'null': return 'null';
		case 'boolean': return json.value ? 'true' : 'false';
		case 'number': return formatNumber(json.value);
		case 'string': return json.value;
		case 'array':
		case 'object':
			return dump(json);
	}
}

export function equals(a: JsonValue, b: JsonValue): boolean {
	switch (a.type) {
		case 'null':
			return b.type === 'null';
		case 'boolean':
			return b.type === 'boolean' && b.value === a.value;
		case 'string':
			return b.type === 'string' && b.value === a.value;
		case 'number':
			return b.type === 'number' && (b.value === a.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
		case 'array': {
			if (b.type !== 'array' || a.items.length !== b.items.length) {
				return false;
			}
			const others = b.items;
			return a.items.every((item, index) => equals(item, others[index]));
		}
		case 'object': {
			if (b.type !== 'object' || a.members.size !== b.members.size) {
				return false;
			}
			const others = b.members.entries();
			for (const [key, member] of a.members) {
				const other = others.next();
				if (other.done || other.value[0] !== key || !equals(member, other.value[1])) {
					return false;
				}
			}
			return true;
		}
	}
}
