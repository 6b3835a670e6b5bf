/**
 * Per-scope registry of exclusive hover regions.
 * Hoverables register once per mount; parent links, opacity, element and handlers are read through
 * the registered ref on every pass, so prop changes never re-register (which would restart the hover session).
 */
import type { RefObject } from 'react';
import { HitTest, type HitRegion } from '../core/hit-test.ts';

// --- [TYPES] -----------------------------------------------------------------

type RegionHandlers = {
	readonly onClaim: () => void;
	readonly onEnter?: (() => void) | undefined;
	readonly onExit?: (() => void) | undefined;
	readonly onHover?: (() => void) | undefined;
	readonly onRelease: () => void;
};
type RegionSource = {
	readonly element: Element | null;
	readonly handlers: RegionHandlers;
	readonly opaque: boolean;
	readonly parentId: string | null;
};
type RegionRegistry = {
	/** Pointer moved to `target` (null: pointer left the scope). */
	readonly dispatch: (target: Node | null) => void;
	readonly register: (id: string, source: RefObject<RegionSource | null>) => () => void;
};

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Document order: later elements paint on top and are tested first. */
const byDocumentOrder = (a: Element | null, b: Element | null): number =>
	a === null || b === null || a === b ? 0 : a.compareDocumentPosition(b) & Node.DOCUMENT_POSITION_PRECEDING ? 1 : -1;

// --- [ENTRY_POINT] -----------------------------------------------------------

const createRegionRegistry = (): RegionRegistry => {
	const sources = new Map<string, RefObject<RegionSource | null>>();
	const claim = HitTest.makeClaim();
	let contained = new Set<string>();
	let claimant: string | null = null;
	const handlersOf = (id: string): RegionHandlers | undefined => sources.get(id)?.current?.handlers;
	const tree = (): ReadonlyArray<HitRegion<Node | null>> => {
		const live = [...sources].flatMap(([id, ref]) => (ref.current === null ? [] : [{ id, source: ref.current }]));
		const ids = new Set(live.map((entry) => entry.id));
		const build = (parentId: string | null): ReadonlyArray<HitRegion<Node | null>> =>
			live
				.filter(({ source }) => (parentId === null ? source.parentId === null || !ids.has(source.parentId) : source.parentId === parentId))
				.sort((a, b) => byDocumentOrder(a.source.element, b.source.element))
				.map(({ id, source }) => ({
					children: build(id),
					contains: (probe: Node | null) => probe !== null && source.element !== null && source.element.contains(probe),
					id,
					opaque: source.opaque,
				}));
		return build(null);
	};
	const dispatch = (target: Node | null): void => {
		const result = HitTest.pass(tree(), target, claim);
		const previous = contained;
		const released = claimant;
		const next = result.entries[0] ?? null;
		contained = new Set(result.contained);
		claimant = next;
		[...previous].filter((id) => !contained.has(id)).forEach((id) => handlersOf(id)?.onExit?.());
		released !== null && released !== next && handlersOf(released)?.onRelease();
		result.contained.filter((id) => !previous.has(id)).forEach((id) => handlersOf(id)?.onEnter?.());
		result.contained.filter((id) => previous.has(id)).forEach((id) => handlersOf(id)?.onHover?.());
		next !== null && next !== released && handlersOf(next)?.onClaim();
	};
	const register = (id: string, source: RefObject<RegionSource | null>): (() => void) => {
		sources.set(id, source);
		return () => {
			sources.delete(id);
			contained.delete(id);
			claimant === id && (claimant = null);
		};
	};
	return Object.freeze({ dispatch, register });
};

// --- [EXPORT] ----------------------------------------------------------------

export { byDocumentOrder, createRegionRegistry };
export type { RegionHandlers, RegionRegistry, RegionSource };
