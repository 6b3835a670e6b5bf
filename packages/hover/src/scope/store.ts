/**
 * Per-scope hover state: one vanilla zustand store holding the current target snapshot.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { HoverOverrides } from '../core/config.ts';
import type { Point, Size } from '../core/geometry.ts';

// --- [TYPES] -----------------------------------------------------------------

type HoverTarget = {
	readonly focused: boolean;
	readonly hovered: boolean;
	readonly id: string;
	/** `<id>#<entry count>`: identifies one hover session of a Hoverable. */
	readonly key: string;
	readonly offset?: Point;
	readonly origin?: Point;
	readonly overrides: HoverOverrides;
	readonly pressed: boolean;
	readonly size?: Size;
};
type HoverState = {
	readonly exit: (id: string) => void;
	readonly hover: (target: HoverTarget) => void;
	readonly hovered: HoverTarget | null;
};
type HoverStore = StoreApi<HoverState>;

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const sessionKey = (id: string, entries: number): string => `${id}#${entries}`;
const samePoint = (a: Point | undefined, b: Point | undefined): boolean => a?.x === b?.x && a?.y === b?.y;
/** Snapshots equal field by field; overrides are compared by reference (Hoverable keeps them stable). */
const sameTarget = (a: HoverTarget | null, b: HoverTarget): boolean =>
	a !== null &&
	a.id === b.id && a.key === b.key && a.overrides === b.overrides &&
	a.focused === b.focused && a.hovered === b.hovered && a.pressed === b.pressed &&
	samePoint(a.offset, b.offset) && samePoint(a.origin, b.origin) &&
	a.size?.height === b.size?.height && a.size?.width === b.size?.width;
const hasGeometry = (target: HoverTarget | null): target is HoverTarget & { readonly offset: Point; readonly origin: Point; readonly size: Size } =>
	target?.size !== undefined && target.offset !== undefined && target.origin !== undefined;

// --- [ENTRY_POINT] -----------------------------------------------------------

const createHoverStore = (): HoverStore =>
	createStore<HoverState>()((set) => ({
		/** Ignored unless `id` is still the current target: a late exit never clears a newer hover. */
		exit: (id) => set((state) => (state.hovered?.id === id ? { hovered: null } : state)),
		hover: (target) => set({ hovered: target }),
		hovered: null,
	}));

// --- [EXPORT] ----------------------------------------------------------------

export { createHoverStore, hasGeometry, sameTarget, sessionKey };
export type { HoverState, HoverStore, HoverTarget };
