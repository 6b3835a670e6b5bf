/**
 * Hover errors via Data.TaggedError: construction-time contract violations and missing scope lookups.
 * Thrown synchronously during render so error boundaries observe them.
 */
import { Data } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type HoverErrorCode = keyof typeof B;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	INVALID_PHYSICS: { code: 'INVALID_PHYSICS' as const, message: 'Spring duration must be positive and bounce within [-1, 1]' },
	MISSING_CHILD: { code: 'MISSING_CHILD' as const, message: 'Hoverable requires either a render function or children' },
	MISSING_DURATION: { code: 'MISSING_DURATION' as const, message: 'A duration must be provided when physics is a Curve' },
	MISSING_SCOPE: { code: 'MISSING_SCOPE' as const, message: 'Hoverable must be rendered within a HoverScope' },
} as const);

// --- [CLASSES] ---------------------------------------------------------------

class HoverError extends Data.TaggedError('HoverError')<{
	readonly code: HoverErrorCode;
	readonly message: string;
}> {
	/** Format error for logging/display with hover:code prefix. */
	get formatted(): string { return `[hover:${this.code}] ${this.message}`; }
	static from(code: HoverErrorCode, message?: string): HoverError {
		return new HoverError({ code, message: message ?? B[code].message });
	}
}

// --- [EXPORT] ----------------------------------------------------------------

export { B as HOVER_ERRORS, HoverError };
export type { HoverErrorCode };
