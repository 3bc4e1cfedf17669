// SPDX-License-Identifier: MIT
// Session Calculus Error Types
// Fault domain for evaluation and program validation

import { formatValue, type Value, type ValueKind } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Evaluation faults
	UnboundVariable: "UnboundVariable",
	TypeMismatch: "TypeMismatch",
	NoMatchingCase: "NoMatchingCase",
	DivisionByZero: "DivisionByZero",
	NegativeRecursionIndex: "NegativeRecursionIndex",
	StepLimitExceeded: "StepLimitExceeded",

	// Driver faults
	NoMainDeclaration: "NoMainDeclaration",
	Deadlock: "Deadlock",
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Session Error Class
//==============================================================================

export class SessionError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "SessionError";
		this.code = code;
	}

	/**
	 * Create an UnboundVariable error
	 */
	static unboundVariable(name: string): SessionError {
		return new SessionError(
			ErrorCodes.UnboundVariable,
			"Unbound variable: " + name,
		);
	}

	/**
	 * Create a TypeMismatch error for a value of the wrong variant
	 */
	static typeMismatch(expected: ValueKind, got: Value, context: string): SessionError {
		return new SessionError(
			ErrorCodes.TypeMismatch,
			"Type mismatch (" +
				context +
				"): expected " +
				expected +
				", got " +
				got.kind +
				" " +
				formatValue(got),
		);
	}

	static noMatchingCase(label: string, available: readonly string[]): SessionError {
		return new SessionError(
			ErrorCodes.NoMatchingCase,
			"No case for label '" +
				label +
				" (branches: " +
				(available.length > 0 ? available.map((l) => "'" + l).join(", ") : "none") +
				")",
		);
	}

	static divisionByZero(): SessionError {
		return new SessionError(ErrorCodes.DivisionByZero, "Division by zero");
	}

	static negativeRecursionIndex(index: bigint): SessionError {
		return new SessionError(
			ErrorCodes.NegativeRecursionIndex,
			"Recursion index must be a natural number, got " + index.toString(),
		);
	}

	static stepLimitExceeded(limit: number): SessionError {
		return new SessionError(
			ErrorCodes.StepLimitExceeded,
			"Global step limit exceeded (" + String(limit) + ")",
		);
	}

	static noMainDeclaration(): SessionError {
		return new SessionError(
			ErrorCodes.NoMainDeclaration,
			"No 'main' value declaration found",
		);
	}

	/** `main` is suspended and nothing is left that could resume it */
	static deadlock(): SessionError {
		return new SessionError(
			ErrorCodes.Deadlock,
			"main is blocked indefinitely on a receive",
		);
	}

	/**
	 * Create a ValidationError summarising a list of validation issues
	 */
	static validation(errors: readonly ValidationError[]): SessionError {
		return new SessionError(
			ErrorCodes.ValidationError,
			"Invalid program: " +
				errors.map((e) => e.path + ": " + e.message).join("; "),
		);
	}
}

export function isSessionError(e: unknown): e is SessionError {
	return e instanceof SessionError;
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
