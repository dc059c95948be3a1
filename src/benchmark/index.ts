import { JsonValue, array, object, parse, stringify } from '../main';

const iterations = 10;
const recordCount = 5000;

function createRecord(index: number): JsonValue {
	return object({
		id: index,
		name: `record ${index}`,
		active: index % 2 === 0,
		score: index / 7,
		tags: array('alpha', 'beta', `tag-${index % 13}`),
		note: index % 5 === 0 ? null : 'line one\nline two\t"quoted" \u00e9\u{1d11e}'
	});
}

const records: JsonValue[] = [];
for (let index = 0; index < recordCount; index++) {
	records.push(createRecord(index));
}
const data = stringify(records);

function measure(label: string, run: () => void): void {
	const before = new Date();
	console.log(`Started ${label} at`, before);
	process.stdout.write(`Running ${iterations} iterations`);
	for (let iteration = 0; iteration < iterations; iteration++) {
		run();
		process.stdout.write('.');
	}
	const after = new Date();
	console.log(`\nEnded ${label} at`, after);

	const average = (after.getTime() - before.getTime()) / iterations;
	console.log(`
Average elapsed time (${label}, ${data.length} characters): ${average}ms
`);
}

const parsed = parse(data);
measure('parse', () => parse(data));
measure('stringify', () => stringify(parsed));
