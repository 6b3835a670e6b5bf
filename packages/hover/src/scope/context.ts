/**
 * Scope handle propagated through React context; the lookup fails loudly outside a HoverScope.
 */
import { Option } from 'effect';
import { createContext, type RefObject, useContext } from 'react';
import { useStore } from 'zustand';
import type { ScopeConfig } from '../core/config.ts';
import { HoverError } from '../core/errors.ts';
import type { RegionRegistry } from './regions.ts';
import type { HoverStore, HoverTarget } from './store.ts';

// --- [TYPES] -----------------------------------------------------------------

type HoverScopeHandle = {
	readonly config: ScopeConfig;
	readonly container: RefObject<HTMLDivElement | null>;
	readonly onHover: (target: HoverTarget) => void;
	readonly onHoverExit: (target: HoverTarget) => void;
	readonly regions: RegionRegistry;
	readonly store: HoverStore;
};

// --- [CONTEXT] ---------------------------------------------------------------

const HoverScopeContext = createContext<HoverScopeHandle | null>(null);
HoverScopeContext.displayName = 'HoverScopeContext';
/** Nearest enclosing Hoverable id; roots of the region tree have none. */
const RegionParentContext = createContext<string | null>(null);
RegionParentContext.displayName = 'RegionParentContext';

// --- [HOOK] ------------------------------------------------------------------

const useHoverScope = (): HoverScopeHandle =>
	Option.fromNullable(useContext(HoverScopeContext)).pipe(Option.getOrThrowWith(() => HoverError.from('MISSING_SCOPE')));
const useHoverTarget = (): HoverTarget | null => useStore(useHoverScope().store, (state) => state.hovered);

// --- [EXPORT] ----------------------------------------------------------------

export { HoverScopeContext, RegionParentContext, useHoverScope, useHoverTarget };
export type { HoverScopeHandle };
