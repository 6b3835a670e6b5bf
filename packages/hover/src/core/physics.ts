/**
 * Motion specifications as a tagged union: simulated springs or fixed-duration curves.
 * Curves cannot drive an animation without a duration; validate() rejects that pairing at construction.
 */
import { Data, Either, Option, pipe, Schema as S } from 'effect';
import type { Transition } from 'motion/react';
import { HoverError } from './errors.ts';

// --- [TYPES] -----------------------------------------------------------------

type Bezier = readonly [number, number, number, number];
type Ease = 'easeIn' | 'easeInOut' | 'easeOut' | 'linear' | Bezier;
type Physics = Data.TaggedEnum<{
	Curve: { readonly ease: Ease };
	Spring: { readonly bounce: number; readonly duration: number };
}>;
type SpringParams = S.Schema.Type<typeof SpringSchema>;

// --- [SCHEMA] ----------------------------------------------------------------

const SpringSchema = S.Struct({
	bounce: pipe(S.Number, S.between(-1, 1)),
	duration: pipe(S.Number, S.positive()),
});

// --- [CONSTANTS] -------------------------------------------------------------

const { $is, $match, Curve, Spring } = Data.taggedEnum<Physics>();
const B = Object.freeze({
	msPerSecond: 1000,
	presets: Object.freeze({
		elegant: Spring({ bounce: 0, duration: 450 }),
		gentle: Spring({ bounce: 0.05, duration: 300 }),
		snappy: Spring({ bounce: 0.15, duration: 200 }),
	}),
});

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const spring = (params: SpringParams): Physics =>
	Either.match(S.decodeUnknownEither(SpringSchema)(params), {
		onLeft: (err) => {
			throw HoverError.from('INVALID_PHYSICS', `${HoverError.from('INVALID_PHYSICS').message}: ${err.message}`);
		},
		onRight: Spring,
	});
const curve = (ease: Ease): Physics => Curve({ ease });
/** Throws MISSING_DURATION when a Curve is configured without an explicit duration. */
const validate = (physics: Physics | undefined, duration: number | undefined): void => {
	physics !== undefined && duration === undefined && $is('Curve')(physics) && (() => {
		throw HoverError.from('MISSING_DURATION');
	})();
};
const toEase = (ease: Ease): Exclude<Ease, Bezier> | [number, number, number, number] =>
	typeof ease === 'string' ? ease : [ease[0], ease[1], ease[2], ease[3]];
const toTransition = (physics: Physics, duration?: number): Transition =>
	$match(physics, {
		Curve: ({ ease }) =>
			pipe(
				Option.fromNullable(duration),
				Option.map((ms): Transition => ({ duration: ms / B.msPerSecond, ease: toEase(ease), type: 'tween' })),
				Option.getOrThrowWith(() => HoverError.from('MISSING_DURATION')),
			),
		Spring: (s): Transition => ({ bounce: s.bounce, duration: (duration ?? s.duration) / B.msPerSecond, type: 'spring' }),
	});

// --- [ENTRY_POINT] -----------------------------------------------------------

const Physics = Object.freeze({
	$is,
	$match,
	curve,
	presets: B.presets,
	spring,
	toTransition,
	validate,
});

// --- [EXPORT] ----------------------------------------------------------------

export { B as PHYSICS_TUNING, Physics };
export type { Bezier, Ease, SpringParams };
