export type DefinitionErrorCode = 'DuplicateName' | 'InvalidDefinition';

export type LiteralErrorCode =
	| 'MalformedLiteral'
	| 'InvalidValue'
	| 'UnknownField'
	| 'MissingField'
	| 'DuplicateField';

export type ParseErrorCode =
	| 'UnknownOption'
	| 'UnknownCommand'
	| 'MissingArgument'
	| 'MissingOptionValue'
	| 'TooManyArguments'
	| LiteralErrorCode;

export type ErrorCode = DefinitionErrorCode | ParseErrorCode;

/** Position of a character inside the raw token sequence. */
export interface LiteralPosition {
	token: number;
	offset: number;
}

export class NestArgsError extends Error {
	readonly code: ErrorCode;
	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = 'NestArgsError';
		this.code = code;
	}
}

/** Raised while the tree is being built; construction stops at the first one. */
export class DefinitionError extends NestArgsError {
	declare readonly code: DefinitionErrorCode;
	constructor(code: DefinitionErrorCode, message: string) {
		super(code, message);
		this.name = 'DefinitionError';
	}
}

export interface ParseErrorDetails {
	tokenIndex?: number;
	token?: string;
	expected?: string;
	suggestions?: string[];
}

export class ParseError extends NestArgsError {
	declare readonly code: ParseErrorCode;
	readonly tokenIndex?: number;
	readonly token?: string;
	readonly expected?: string;
	readonly suggestions: string[];
	constructor(
		code: ParseErrorCode,
		message: string,
		details: ParseErrorDetails = {}
	) {
		super(code, message);
		this.name = 'ParseError';
		this.tokenIndex = details.tokenIndex;
		this.token = details.token;
		this.expected = details.expected;
		this.suggestions = details.suggestions ?? [];
	}
}

export class LiteralError extends ParseError {
	declare readonly code: LiteralErrorCode;
	readonly position: LiteralPosition;
	constructor(
		code: LiteralErrorCode,
		message: string,
		position: LiteralPosition,
		details: Omit<ParseErrorDetails, 'tokenIndex'> = {}
	) {
		super(code, message, { ...details, tokenIndex: position.token });
		this.name = 'LiteralError';
		this.position = position;
	}
}

export function isNestArgsError(e: unknown): e is NestArgsError {
	return e instanceof NestArgsError;
}
