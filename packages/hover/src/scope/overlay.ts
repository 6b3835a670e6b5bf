/**
 * Overlay state machine shared by ink and tooltip: idle -> tracking -> releasing -> idle.
 * The geometry cache pins the last resolved geometry while a grace timer runs, so a quick
 * handoff between targets animates from the previous target instead of from the origin.
 */
import { useEffect, useRef, useState } from 'react';
import type { Measurement } from '../core/geometry.ts';
import { hasGeometry, type HoverTarget } from './store.ts';

// --- [TYPES] -----------------------------------------------------------------

type OverlayPhase = 'idle' | 'releasing' | 'tracking';
type MeasuredTarget = HoverTarget & Measurement;
type OverlayCache<G> = { readonly geometry: G; readonly target: MeasuredTarget };
type OverlayFrame<G> =
	| { readonly phase: 'idle' }
	| { readonly geometry: G; readonly phase: 'releasing' | 'tracking'; readonly target: MeasuredTarget };
type OverlayStep<G> = { readonly cache: OverlayCache<G> | null; readonly frame: OverlayFrame<G> };

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	idle: Object.freeze({ phase: 'idle' as const }),
});

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const step = <G>(cache: OverlayCache<G> | null, target: HoverTarget | null, project: (target: MeasuredTarget) => G): OverlayStep<G> => {
	const tracked: OverlayCache<G> | null = hasGeometry(target) ? { geometry: project(target), target } : null;
	return tracked === null
		? { cache, frame: cache === null ? B.idle : { ...cache, phase: 'releasing' } }
		: { cache: tracked, frame: { ...tracked, phase: 'tracking' } };
};

// --- [HOOK] ------------------------------------------------------------------

/** Re-arms the grace timer after every render while releasing; at most one timer is pending. */
const useOverlayFrame = <G>(target: HoverTarget | null, project: (target: MeasuredTarget) => G, graceMs: number): OverlayFrame<G> => {
	const cacheRef = useRef<OverlayCache<G> | null>(null);
	const [, setCleared] = useState(0);
	const { cache, frame } = step(cacheRef.current, target, project);
	cacheRef.current = cache;
	useEffect(() => {
		const handle =
			frame.phase === 'releasing'
				? setTimeout(() => {
						cacheRef.current = null;
						setCleared((n) => n + 1);
					}, graceMs)
				: undefined;
		return () => clearTimeout(handle);
	});
	return frame;
};
/** True once `delay` ms have passed since `key` first appeared; false again for every new key. */
const useRevealGate = (key: string | null, delay: number): boolean => {
	const [revealed, setRevealed] = useState<string | null>(null);
	useEffect(() => {
		const handle =
			key !== null && revealed !== key
				? setTimeout(() => setRevealed(key), delay)
				: undefined;
		return () => clearTimeout(handle);
	}, [key, delay, revealed]);
	return key !== null && (revealed === key || delay <= 0);
};

// --- [ENTRY_POINT] -----------------------------------------------------------

const Overlay = Object.freeze({ idle: B.idle, step });

// --- [EXPORT] ----------------------------------------------------------------

export { B as OVERLAY_TUNING, Overlay, useOverlayFrame, useRevealGate };
export type { MeasuredTarget, OverlayCache, OverlayFrame, OverlayPhase, OverlayStep };
