/**
 * Runtime validation utilities.
 *
 * Lightweight validators for configuration objects read from disk, built
 * with a fluent builder pattern.
 */


// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorFn<T = unknown> = (value: unknown) => { valid: boolean; error?: string; value?: T };

export interface ValidationError {
	path: string;
	message: string;
	received: unknown;
}

export interface ValidationResult<T = unknown> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;
	private patternRe?: RegExp;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	pattern(re: RegExp): this {
		this.patternRe = re;
		return this;
	}

	validate: ValidatorFn<string> = (value: unknown) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${typeof value}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `String length ${value.length} is below minimum ${this.minLen}` };
		}
		if (this.patternRe && !this.patternRe.test(value)) {
			return { valid: false, error: `String does not match pattern ${this.patternRe}` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	constructor(private schema: T) {}

	validate: ValidatorFn<InferSchema<T>> = (value: unknown) => {
		if (typeof value !== "object" || value === null || Array.isArray(value)) {
			return { valid: false, error: `Expected object, received ${value === null ? "null" : Array.isArray(value) ? "array" : typeof value}` };
		}
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const fieldResult = validator(Reflect.get(value, key));
			if (!fieldResult.valid) {
				errors.push(`${key}: ${fieldResult.error}`);
			} else if (fieldResult.value !== undefined) {
				result[key] = fieldResult.value;
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		return { valid: true, value: result as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value: unknown) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

class OneOfValidator<T extends string> {
	constructor(private allowed: readonly T[]) {}

	validate: ValidatorFn<T> = (value: unknown) => {
		const match = this.allowed.find((candidate) => candidate === value);
		if (match === undefined) {
			return { valid: false, error: `Expected one of ${this.allowed.map((a) => JSON.stringify(a)).join(", ")}, received ${JSON.stringify(value)}` };
		}
		return { valid: true, value: match };
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * Usage:
 * ```ts
 * const settingsV = v.object({
 *   pom: v.optional(v.string().min(1).validate).validate,
 *   format: v.optional(v.oneOf(["text", "json"] as const).validate).validate,
 * }).validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
	oneOf: <T extends string>(allowed: readonly T[]) => new OneOfValidator<T>(allowed),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Validate a value against a validator function.
 *
 * Returns a structured {@link ValidationResult} rather than throwing.
 */
export function validate<T>(value: unknown, validator: ValidatorFn<T>): ValidationResult<T> {
	const result = validator(value);
	if (result.valid) {
		return { valid: true, errors: [], value: result.value };
	}
	return {
		valid: false,
		errors: [{
			path: "$",
			message: result.error ?? "Validation failed",
			received: value,
		}],
	};
}
