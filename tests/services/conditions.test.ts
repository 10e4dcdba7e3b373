import { compileRules } from '../../src/core';
import { compileActionFlag, compileCondition, compileConditionSource, isWordChar } from '../../src/services/conditions';
import { NullSpanOracle } from '../../src/services/span-oracle';
import { contextFor } from '../support/buffer';

class MathOracle extends NullSpanOracle {
	spanKindAt(): string | null {
		return 'math';
	}
}

describe('conditions', () => {
	const rules = compileRules({});

	it('should compare text before and after the cursor', () => {
		expect(compileCondition({ textBefore: 'ab' })(contextFor('xab|', rules))).toBe(true);
		expect(compileCondition({ textBefore: 'ab' })(contextFor('xa|b', rules))).toBe(false);
		expect(compileCondition({ textAfter: ')' })(contextFor('(|)', rules))).toBe(true);
	});

	it('should classify the character under the cursor', () => {
		const word = compileCondition({ charUnderCursor: 'word' });
		const nonWord = compileCondition({ charUnderCursor: 'nonWord' });
		expect(word(contextFor('a|', rules))).toBe(true);
		expect(nonWord(contextFor('a |', rules))).toBe(true);
		expect(nonWord(contextFor('|', rules))).toBe(true);
	});

	it('should check the span kind', () => {
		const inMath = compileCondition({ inSpan: 'math' });
		expect(inMath(contextFor('$x|$', rules, { oracle: new MathOracle() }))).toBe(true);
		expect(inMath(contextFor('$x|$', rules))).toBe(false);
	});

	it('should combine conditions', () => {
		const ctx = contextFor('ab|', rules);
		expect(compileCondition({ all: [{ textBefore: 'b' }, { charUnderCursor: 'word' }] })(ctx)).toBe(true);
		expect(compileCondition({ any: [{ textBefore: 'x' }, { textBefore: 'ab' }] })(ctx)).toBe(true);
		expect(compileCondition({ not: { textBefore: 'b' } })(ctx)).toBe(false);
	});

	it('should read an array as all of its conditions', () => {
		const predicate = compileConditionSource([{ textBefore: 'b' }, { textAfter: 'c' }]);
		expect(predicate(contextFor('ab|c', rules))).toBe(true);
		expect(predicate(contextFor('ab|', rules))).toBe(false);
	});

	it('should enable absent action flags', () => {
		const ctx = contextFor('a|', rules);
		expect(compileActionFlag(undefined)(ctx)).toBe(true);
		expect(compileActionFlag(true)(ctx)).toBe(true);
		expect(compileActionFlag(false)(ctx)).toBe(false);
		expect(compileActionFlag({ textBefore: 'z' })(ctx)).toBe(false);
	});

	it('should treat letters and digits as word characters', () => {
		expect(isWordChar('é')).toBe(true);
		expect(isWordChar('7')).toBe(true);
		expect(isWordChar('_')).toBe(false);
		expect(isWordChar('-')).toBe(false);
		expect(isWordChar('')).toBe(false);
	});
});
