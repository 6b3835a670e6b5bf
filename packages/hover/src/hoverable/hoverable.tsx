/**
 * Hoverable: leaf that tracks hovered/focused/pressed, claims its exclusive region in the enclosing
 * HoverScope, and publishes a measured snapshot to the scope after every commit while hovered.
 * Claiming and measuring are split: the pointer event marks the claim, the following layout phase
 * measures against the scope container and registers the target. Unchanged snapshots are not republished.
 */
import { useMergeRefs } from '@floating-ui/react';
import {
	type CSSProperties, type FC, type KeyboardEvent, type ReactNode, type Ref,
	useContext, useEffect, useId, useLayoutEffect, useRef, useState,
} from 'react';
import { mergeProps, useFocus, useFocusRing, usePress } from 'react-aria';
import type { XOR } from 'ts-essentials';
import { Config, type HoverOverrides } from '../core/config.ts';
import type { Decoration } from '../core/decoration.ts';
import { HoverError } from '../core/errors.ts';
import { Geometry } from '../core/geometry.ts';
import type { Physics } from '../core/physics.ts';
import { cn, same, warn } from '../core/utils.ts';
import { RegionParentContext, useHoverScope } from '../scope/context.ts';
import type { RegionSource } from '../scope/regions.ts';
import { type HoverTarget, sameTarget, sessionKey } from '../scope/store.ts';

// --- [TYPES] -----------------------------------------------------------------

type HoverableState = { readonly focused: boolean; readonly hovered: boolean; readonly pressed: boolean };
type HoverableRender = (state: HoverableState, children?: ReactNode) => ReactNode;
type HoverableBaseProps = {
	readonly autoFocus?: boolean;
	readonly className?: string;
	readonly cursor?: CSSProperties['cursor'];
	readonly focusRef?: Ref<HTMLDivElement>;
	readonly inkDecoration?: Decoration;
	readonly inkDuration?: number;
	readonly inkPhysics?: Physics;
	readonly onEnter?: () => void;
	readonly onExit?: () => void;
	readonly onFocusChange?: (focused: boolean) => void;
	readonly onHover?: () => void;
	readonly onTap?: () => void;
	/** Translucent regions claim only when no descendant does and never block their parent. Default true. */
	readonly opaque?: boolean;
	/** `'ctrl+k'` style patterns; modifiers: cmd, ctrl, alt, shift. */
	readonly shortcuts?: Readonly<Record<string, () => void>>;
	readonly style?: CSSProperties;
	readonly tooltipDecoration?: Decoration;
	readonly tooltipDelay?: number;
	readonly tooltipDuration?: number;
	readonly tooltipPhysics?: Physics;
	readonly tooltipRich?: ReactNode;
	readonly tooltipText?: string;
};
type HoverableProps = HoverableBaseProps &
	XOR<{ readonly children?: ReactNode; readonly render: HoverableRender }, { readonly children: ReactNode }>;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	tabIndex: 0,
	warnings: Object.freeze({
		bothTooltips: 'Hoverable received both tooltipText and tooltipRich; tooltipText is shown',
	}),
});

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const matchShortcut = (e: KeyboardEvent, pattern: string): boolean => {
	const parts = pattern.toLowerCase().split('+');
	const key = parts.at(-1) ?? '';
	const mods = new Set(parts.slice(0, -1));
	return e.key.toLowerCase() === key &&
		mods.has('cmd') === e.metaKey && mods.has('ctrl') === e.ctrlKey &&
		mods.has('alt') === e.altKey && mods.has('shift') === e.shiftKey;
};

// --- [HOOK] ------------------------------------------------------------------

/** Keeps the previous value while the next one is structurally equal, so inline props do not republish. */
const useStable = <T,>(value: T): T => {
	const ref = useRef(value);
	same(ref.current, value) || (ref.current = value);
	return ref.current;
};
/** Counts structural changes of `value` over the component's lifetime. */
const useRevision = (value: unknown): number => {
	const ref = useRef({ revision: 0, value });
	same(ref.current.value, value) || (ref.current = { revision: ref.current.revision + 1, value });
	return ref.current.revision;
};

// --- [ENTRY_POINT] -----------------------------------------------------------

const Hoverable: FC<HoverableProps> = ({
	autoFocus, children, className, cursor, focusRef, inkDecoration, inkDuration, inkPhysics, onEnter, onExit, onFocusChange, onHover,
	onTap, opaque = true, render, shortcuts, style, tooltipDecoration, tooltipDelay, tooltipDuration, tooltipPhysics, tooltipRich, tooltipText,
}) => {
	render === undefined && children == null && (() => {
		throw HoverError.from('MISSING_CHILD');
	})();
	const richRevision = useRevision(tooltipRich);
	const overrides = useStable<HoverOverrides>({
		ink: { decoration: inkDecoration, duration: inkDuration, physics: inkPhysics },
		tooltip: {
			decoration: tooltipDecoration, delay: tooltipDelay, duration: tooltipDuration, physics: tooltipPhysics,
			revision: richRevision, rich: tooltipRich, text: tooltipText,
		},
	});
	Config.validate(overrides);
	const { container, onHover: publish, onHoverExit: retract, regions } = useHoverScope();
	const id = useId();
	const parentId = useContext(RegionParentContext);
	const elementRef = useRef<HTMLDivElement | null>(null);
	const mergedRef = useMergeRefs([elementRef, focusRef]);
	const source = useRef<RegionSource | null>(null);
	const published = useRef<HoverTarget | null>(null);
	const entries = useRef(0);
	const [hovered, setHovered] = useState(false);
	const { focusProps: ringProps, isFocusVisible } = useFocusRing();
	const { focusProps } = useFocus({ onFocusChange });
	const { isPressed, pressProps } = usePress({ onPress: () => onTap?.() });
	const hasBothTooltips = tooltipText !== undefined && tooltipRich != null;
	useEffect(() => {
		hasBothTooltips && warn(B.warnings.bothTooltips);
	}, [hasBothTooltips]);
	useEffect(() => {
		autoFocus && elementRef.current?.focus();
	}, [autoFocus]);
	useLayoutEffect(() => {
		source.current = {
			element: elementRef.current,
			handlers: {
				onClaim: () => {
					entries.current += 1;
					setHovered(true);
				},
				onEnter,
				onExit,
				onHover,
				onRelease: () => setHovered(false),
			},
			opaque,
			parentId,
		};
	});
	useLayoutEffect(() => {
		const unregister = regions.register(id, source);
		return () => {
			unregister();
			published.current && retract(published.current);
			published.current = null;
		};
	}, [id, regions, retract]);
	// Second phase: geometry is only read after the commit that follows the claim.
	useLayoutEffect(() => {
		const element = elementRef.current;
		const frame = container.current;
		const target: HoverTarget | null =
			hovered && element !== null && frame !== null
				? {
						...Geometry.measure(element, frame),
						focused: isFocusVisible,
						hovered,
						id,
						key: sessionKey(id, entries.current),
						overrides,
						pressed: isPressed,
					}
				: null;
		const previous = published.current;
		const unchanged = target !== null && sameTarget(previous, target);
		unchanged || (published.current = target);
		target === null ? previous && retract(previous) : unchanged || publish(target);
	});
	const onKeyDown = (e: KeyboardEvent): void => {
		const match = shortcuts && Object.entries(shortcuts).find(([pattern]) => matchShortcut(e, pattern));
		match && (() => {
			e.preventDefault();
			match[1]();
		})();
	};
	const state: HoverableState = { focused: isFocusVisible, hovered, pressed: isPressed };
	return (
		<div
			{...mergeProps(pressProps, ringProps, focusProps, { onKeyDown })}
			className={cn(className)}
			data-focused={isFocusVisible}
			data-hovered={hovered}
			data-pressed={isPressed}
			data-slot='hoverable'
			ref={mergedRef}
			style={{ cursor, ...style }}
			tabIndex={B.tabIndex}
		>
			<RegionParentContext.Provider value={id}>{render === undefined ? children : render(state, children)}</RegionParentContext.Provider>
		</div>
	);
};

// --- [EXPORT] ----------------------------------------------------------------

export { B as HOVERABLE_TUNING, Hoverable, matchShortcut };
export type { HoverableProps, HoverableRender, HoverableState };
