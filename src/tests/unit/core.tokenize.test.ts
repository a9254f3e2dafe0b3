import { describe, expect, it } from 'vitest';
import { LiteralError } from '../../core/errors.js';
import { tokenize } from '../../core/tokenize.js';

describe('tokenize', () => {
	it('splits on whitespace and resolves quotes', () => {
		expect(tokenize('user Jack 28')).toEqual(['user', 'Jack', '28']);
		expect(tokenize(`set "a b" 'c d'`)).toEqual(['set', 'a b', 'c d']);
		expect(tokenize('a "" b')).toEqual(['a', '', 'b']);
		expect(tokenize('x\\ y')).toEqual(['x y']);
	});

	it('keeps bracketed groups whole and verbatim', () => {
		expect(tokenize('add [1, 2, 3] {name="Ann Lee", age=3}')).toEqual([
			'add',
			'[1, 2, 3]',
			'{name="Ann Lee", age=3}',
		]);
		expect(tokenize('[[1,2], [3]] z')).toEqual(['[[1,2], [3]]', 'z']);
	});

	it('leaves unbalanced brackets to the literal parser', () => {
		expect(tokenize('[1, 2')).toEqual(['[1, 2']);
	});

	it('errors on an unterminated quote', () => {
		let caught: unknown;
		try {
			tokenize('say "hi');
		} catch (e) {
			caught = e;
		}
		expect(caught).toBeInstanceOf(LiteralError);
		if (caught instanceof LiteralError) {
			expect(caught.code).toBe('MalformedLiteral');
			expect(caught.message).toBe('Unterminated " quote at character 4');
			expect(caught.position).toEqual({ token: 1, offset: 0 });
		}
	});

	it('errors on a dangling escape', () => {
		expect(() => tokenize('a\\')).toThrowError(
			'Dangling escape at end of input'
		);
	});
});
