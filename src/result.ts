// Expected failures are values, not exceptions; exceptions are kept for misuse (bad arity, unknown operators)

export type FailureKind =
	| 'RatioNotMet'
	| 'NotPolynomial'
	| 'ExpansionLimit'
	| 'MultipleOccurrences'
	| 'NoOccurrence'
	| 'NoInverse'
	| 'UnsolvableStrategy'
	| 'InconsistentSystem'
	| 'NotLinear';

export interface Failure<K extends FailureKind = FailureKind> {
	kind:		K;
	message:	string;
}

export interface Ok<T> {
	ok:		true;
	value:	T;
}

export interface Fail<K extends FailureKind = FailureKind> {
	ok:			false;
	failure:	Failure<K>;
}

export type Result<T, K extends FailureKind = FailureKind> = Ok<T> | Fail<K>;

export function ok<T>(value: T): Ok<T> {
	return { ok: true, value };
}

export function fail<K extends FailureKind>(kind: K, message: string): Fail<K> {
	return { ok: false, failure: { kind, message } };
}

export function unwrap<T>(result: Result<T>): T {
	if (!result.ok)
		throw new Error(`${result.failure.kind}: ${result.failure.message}`);
	return result.value;
}
