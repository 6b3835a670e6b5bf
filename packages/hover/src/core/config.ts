/**
 * Configuration resolution: Hoverable override -> HoverScope default -> CSS custom property -> built-in default.
 * Scope-level fallbacks are resolved once per scope; per-target resolution happens on every overlay render.
 */
import type { Transition } from 'motion/react';
import type { ReactNode } from 'react';
import { Decoration } from './decoration.ts';
import { Physics } from './physics.ts';
import { readCssMs, readCssPx } from './utils.ts';

// --- [TYPES] -----------------------------------------------------------------

type MotionOptions = {
	readonly decoration?: Decoration;
	readonly duration?: number;
	readonly physics?: Physics;
};
type TooltipOptions = MotionOptions & { readonly delay?: number };
type HoverOverrides = {
	readonly ink: MotionOptions;
	/** `revision` counts structural changes of `rich`; it keys the content transition. */
	readonly tooltip: TooltipOptions & { readonly revision?: number; readonly rich?: ReactNode; readonly text?: string };
};
type ScopeConfig = {
	readonly gap: number;
	readonly grace: number;
	readonly ink: MotionOptions & { readonly decoration: Decoration; readonly physics: Physics };
	readonly tooltip: TooltipOptions & { readonly decoration: Decoration; readonly delay: number; readonly physics: Physics };
};
type ScopeOptions = { readonly ink?: MotionOptions; readonly tooltip?: TooltipOptions };
type TooltipContent = { readonly key: string; readonly node: ReactNode };
type ResolvedInk = { readonly decoration: Decoration; readonly transition: Transition };
type ResolvedTooltip = {
	readonly content: TooltipContent | null;
	readonly contentTransition: Transition;
	readonly decoration: Decoration;
	readonly delay: number;
	readonly transition: Transition;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	content: Object.freeze({ duration: 300, ease: 'easeInOut' as const }),
	cssVars: Object.freeze({
		delay: '--hover-tooltip-delay',
		gap: '--hover-tooltip-gap',
		grace: '--hover-release-delay',
	}),
	defaults: Object.freeze({
		delay: 1000,
		gap: 24,
		grace: 300,
		padding: 8,
		physics: Physics.presets.gentle,
	}),
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Construction-time check of both physics/duration pairs. */
const validate = (options: ScopeOptions): void => {
	Physics.validate(options.ink?.physics, options.ink?.duration);
	Physics.validate(options.tooltip?.physics, options.tooltip?.duration);
};
const scope = (options: ScopeOptions): ScopeConfig => ({
	gap: readCssPx(B.cssVars.gap) || B.defaults.gap,
	grace: readCssMs(B.cssVars.grace) || B.defaults.grace,
	ink: {
		...options.ink,
		decoration: options.ink?.decoration ?? Decoration.defaults.ink,
		physics: options.ink?.physics ?? B.defaults.physics,
	},
	tooltip: {
		...options.tooltip,
		decoration: options.tooltip?.decoration ?? Decoration.defaults.tooltip,
		delay: options.tooltip?.delay ?? (readCssMs(B.cssVars.delay) || B.defaults.delay),
		physics: options.tooltip?.physics ?? B.defaults.physics,
	},
});
const resolveInk = (own: MotionOptions | undefined, config: ScopeConfig): ResolvedInk => ({
	decoration: own?.decoration ?? config.ink.decoration,
	transition: Physics.toTransition(own?.physics ?? config.ink.physics, own?.duration ?? config.ink.duration),
});
/** Text wins over rich content; the content key changes whenever the visible content should transition. */
const resolveContent = (id: string, own: HoverOverrides['tooltip']): TooltipContent | null =>
	own.text === undefined
		? own.rich == null ? null : { key: `rich:${id}#${own.revision ?? 0}`, node: own.rich }
		: { key: `text:${own.text}`, node: own.text };
/** Content switches always ease in and out; an explicit tooltip duration replaces the default one. */
const contentTransition = (duration?: number): Transition =>
	Physics.toTransition(Physics.curve(B.content.ease), duration ?? B.content.duration);
const resolveTooltip = (id: string | null, own: HoverOverrides['tooltip'] | undefined, config: ScopeConfig): ResolvedTooltip => {
	const duration = own?.duration ?? config.tooltip.duration;
	return {
		content: id === null || own === undefined ? null : resolveContent(id, own),
		contentTransition: contentTransition(duration),
		decoration: own?.decoration ?? config.tooltip.decoration,
		delay: own?.delay ?? config.tooltip.delay,
		transition: Physics.toTransition(own?.physics ?? config.tooltip.physics, duration),
	};
};

// --- [ENTRY_POINT] -----------------------------------------------------------

const Config = Object.freeze({
	defaults: B.defaults,
	resolveInk,
	resolveTooltip,
	scope,
	validate,
});

// --- [EXPORT] ----------------------------------------------------------------

export { B as CONFIG_TUNING, Config };
export type { HoverOverrides, MotionOptions, ResolvedInk, ResolvedTooltip, ScopeConfig, ScopeOptions, TooltipContent, TooltipOptions };
