/**
 * Box decoration for ink and tooltip surfaces, mapped to CSS.
 * transparent() keeps shape, border, shadow and gradient so a fading ink does not change outline.
 */
import { defined } from './utils.ts';

// --- [TYPES] -----------------------------------------------------------------

type Decoration = {
	readonly backgroundImage?: string;
	readonly border?: string;
	readonly borderRadius?: number | string;
	readonly boxShadow?: string;
	readonly color?: string;
};
type DecorationStyle = {
	readonly backgroundColor?: string;
	readonly backgroundImage?: string;
	readonly border?: string;
	readonly borderRadius?: number | string;
	readonly boxShadow?: string;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	defaults: Object.freeze({
		ink: Object.freeze({ borderRadius: 8, color: 'rgba(0, 0, 0, 0.05)' }) satisfies Decoration,
		tooltip: Object.freeze({
			borderRadius: 8,
			boxShadow: '0 0 16px rgba(200, 200, 200, 0.59)',
			color: 'rgb(250, 250, 250)',
		}) satisfies Decoration,
	}),
	transparent: 'rgba(0, 0, 0, 0)',
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const transparent = (decoration: Decoration): Decoration => ({ ...decoration, color: B.transparent });
const toStyle = (decoration: Decoration): DecorationStyle =>
	defined({
		backgroundColor: decoration.color,
		backgroundImage: decoration.backgroundImage,
		border: decoration.border,
		borderRadius: decoration.borderRadius,
		boxShadow: decoration.boxShadow,
	});

// --- [ENTRY_POINT] -----------------------------------------------------------

const Decoration = Object.freeze({
	defaults: B.defaults,
	toStyle,
	transparent,
});

// --- [EXPORT] ----------------------------------------------------------------

export { B as DECORATION_TUNING, Decoration };
export type { DecorationStyle };
