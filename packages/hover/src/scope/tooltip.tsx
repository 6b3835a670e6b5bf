/**
 * Tooltip overlay above the scope content: flips above/below the target by viewport half,
 * reveals content only after the resolved delay, and cross-fades content changes in place.
 */
import { AnimatePresence, motion, type Transition } from 'motion/react';
import { type ReactNode, useEffect, useState } from 'react';
import { Config, type TooltipContent } from '../core/config.ts';
import { Decoration } from '../core/decoration.ts';
import { type Anchor, Geometry } from '../core/geometry.ts';
import { useHoverScope, useHoverTarget } from './context.ts';
import { type MeasuredTarget, useOverlayFrame, useRevealGate } from './overlay.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	content: Object.freeze({
		animate: Object.freeze({ opacity: 1, y: '0%' }),
		exit: Object.freeze({ opacity: 0, y: '-50%' }),
		initial: Object.freeze({ opacity: 0, y: '50%' }),
		style: Object.freeze({ gridArea: '1 / 1' }),
	}),
	padding: Config.defaults.padding,
	style: Object.freeze({
		anchor: Object.freeze({ height: 0, pointerEvents: 'none', position: 'absolute', width: 0, zIndex: 2 } as const),
		bubble: Object.freeze({ display: 'grid', left: 0, position: 'absolute', top: 0, whiteSpace: 'nowrap', x: '-50%', y: '-50%' } as const),
	}),
});

// --- [HOOK] ------------------------------------------------------------------

const useViewportHeight = (): number => {
	const [height, setHeight] = useState(() => globalThis.innerHeight);
	useEffect(() => {
		const onResize = (): void => setHeight(globalThis.innerHeight);
		globalThis.addEventListener('resize', onResize);
		return () => globalThis.removeEventListener('resize', onResize);
	}, []);
	return height;
};

// --- [COMPONENTS] ------------------------------------------------------------

const TooltipBody = ({ content, transition }: { readonly content: TooltipContent | null; readonly transition: Transition }): ReactNode => (
	<AnimatePresence initial={false}>
		{content && (
			<motion.div
				animate={B.content.animate}
				data-slot='hover-tooltip-content'
				exit={B.content.exit}
				initial={B.content.initial}
				key={content.key}
				style={B.content.style}
				transition={transition}
			>
				{content.node}
			</motion.div>
		)}
	</AnimatePresence>
);

// --- [ENTRY_POINT] -----------------------------------------------------------

const Tooltip = (): ReactNode => {
	const scope = useHoverScope();
	const viewportHeight = useViewportHeight();
	const frame = useOverlayFrame(
		useHoverTarget(),
		(target: MeasuredTarget): Anchor => Geometry.tooltipAnchor(target, viewportHeight, scope.config.gap),
		scope.config.grace,
	);
	const own = frame.phase === 'idle' ? undefined : frame.target.overrides.tooltip;
	const resolved = Config.resolveTooltip(frame.phase === 'tracking' ? frame.target.id : null, own, scope.config);
	const revealed = useRevealGate(frame.phase === 'tracking' && resolved.content !== null ? frame.target.key : null, resolved.delay);
	const content = revealed ? resolved.content : null;
	const decoration = content === null ? Decoration.transparent(resolved.decoration) : resolved.decoration;
	return (
		<motion.div
			animate={frame.phase === 'idle' ? {} : { left: frame.geometry.left, top: frame.geometry.top }}
			data-slot='hover-tooltip-anchor'
			initial={false}
			style={B.style.anchor}
			transition={resolved.transition}
		>
			<motion.div
				animate={{ ...Decoration.toStyle(decoration), opacity: content === null ? 0 : 1, padding: content === null ? 0 : B.padding }}
				data-phase={frame.phase}
				data-placement={frame.phase === 'idle' ? undefined : frame.geometry.placement}
				data-slot='hover-tooltip'
				initial={false}
				role='tooltip'
				style={B.style.bubble}
				transition={resolved.transition}
			>
				<TooltipBody content={content} transition={resolved.contentTransition} />
			</motion.div>
		</motion.div>
	);
};

// --- [EXPORT] ----------------------------------------------------------------

export { B as TOOLTIP_TUNING, Tooltip };
