/**
 * Ink overlay: an animated rectangle below the scope content that follows the hovered target.
 */
import { motion, type Transition } from 'motion/react';
import { type ReactNode, useEffect, useRef } from 'react';
import { Config } from '../core/config.ts';
import { Decoration } from '../core/decoration.ts';
import { Geometry, type Rect } from '../core/geometry.ts';
import { useHoverScope, useHoverTarget } from './context.ts';
import { type MeasuredTarget, type OverlayPhase, useOverlayFrame } from './overlay.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	jump: Object.freeze({ duration: 0 }),
	rest: Object.freeze({ height: 0, width: 0 }),
	style: Object.freeze({ pointerEvents: 'none', position: 'absolute', zIndex: 0 } as const),
});

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const project = (target: MeasuredTarget): Rect => Geometry.inkRect(target.size, target.offset);

// --- [ENTRY_POINT] -----------------------------------------------------------

const Ink = (): ReactNode => {
	const scope = useHoverScope();
	const frame = useOverlayFrame(useHoverTarget(), project, scope.config.grace);
	const committed = useRef<OverlayPhase>('idle');
	useEffect(() => {
		committed.current = frame.phase;
	});
	const resolved = Config.resolveInk(frame.phase === 'idle' ? undefined : frame.target.overrides.ink, scope.config);
	const decoration = frame.phase === 'tracking' ? resolved.decoration : Decoration.transparent(resolved.decoration);
	// Leaving idle places the ink at the target instead of sliding in from the previous position.
	const transition: Transition =
		committed.current === 'idle' && frame.phase !== 'idle' ? { default: resolved.transition, left: B.jump, top: B.jump } : resolved.transition;
	return (
		<motion.div
			animate={{ ...(frame.phase === 'idle' ? B.rest : frame.geometry), ...Decoration.toStyle(decoration) }}
			aria-hidden
			data-phase={frame.phase}
			data-slot='hover-ink'
			initial={false}
			style={B.style}
			transition={transition}
		/>
	);
};

// --- [EXPORT] ----------------------------------------------------------------

export { B as INK_TUNING, Ink };
