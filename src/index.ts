export {
	symbolic, symbolicConstant, symbolicNamed, symbolicVariable, symbolicMatcher, symbolicCall, symbolicVector,
	compareSymbolic, constValue, approx, sum, product, power, negate, quotient, difference, call,
} from './symbolic';
export type { Bindings, Visitor, StringifyOptions, ListForm } from './symbolic';

export { defineOperator, hasOperator, operatorInfo, operatorNames, foldCall, Precedence } from './operators';
export type { OperatorInfo, OperatorDefinition } from './operators';

export { ok, fail, unwrap } from './result';
export type { Result, Ok, Fail, Failure, FailureKind } from './result';

export { PatternRule, applyRule, applyRules, simplifyRules, Budget } from './rules';
export type { Rule } from './rules';

export { canonical } from './canonical';
export { evaluateConstants, evaluate } from './evaluate';
export type { EvaluateBindings } from './evaluate';
export { multiplyOut, expandFully } from './expand';
export type { ExpandOptions } from './expand';
export { simplify, trySimplify, setDefaultSimplifyOptions, getDefaultSimplifyOptions } from './simplify';
export type { SimplifyOptions } from './simplify';

export { polynomialCoefficients, polynomialDegree, polynomialFromCoefficients, toPolynomialNormalForm, rewriteExponentials } from './polynomial';
export { derivative, differentiate } from './differentiate';
export { rearrange } from './rearrange';
export { Placeholders, linearCoefficients, solveLinear } from './linear';
export type { LinearForm, LinearOptions } from './linear';
export { solve, solvePolynomial, allValues } from './solve';
export type { SolutionSet, SolveOptions } from './solve';

export * as rational from './rational';
