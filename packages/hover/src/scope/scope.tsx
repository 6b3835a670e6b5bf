/**
 * HoverScope: coordination point for a subtree of Hoverables. Owns the hovered-target store and the
 * exclusive region registry, feeds pointer movement into the registry, and renders ink below and the
 * tooltip above the content. Overlays never take pointer events.
 */
import { type CSSProperties, type FC, type MouseEvent, type ReactNode, useMemo, useRef } from 'react';
import { Config, type ScopeConfig } from '../core/config.ts';
import type { Decoration } from '../core/decoration.ts';
import type { Physics } from '../core/physics.ts';
import { cn } from '../core/utils.ts';
import { type HoverScopeHandle, HoverScopeContext, RegionParentContext, useHoverScope, useHoverTarget } from './context.ts';
import { Ink } from './ink.tsx';
import { createRegionRegistry } from './regions.ts';
import { createHoverStore } from './store.ts';
import { Tooltip } from './tooltip.tsx';

// --- [TYPES] -----------------------------------------------------------------

type HoverScopeProps = {
	readonly children?: ReactNode;
	readonly className?: string;
	readonly inkDecoration?: Decoration;
	readonly inkDuration?: number;
	readonly inkPhysics?: Physics;
	readonly style?: CSSProperties;
	readonly tooltipDecoration?: Decoration;
	readonly tooltipDelay?: number;
	readonly tooltipDuration?: number;
	readonly tooltipPhysics?: Physics;
};
type ScopeCore = Omit<HoverScopeHandle, 'config' | 'container'>;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
	style: Object.freeze({
		container: Object.freeze({ position: 'relative' } as const),
		content: Object.freeze({ position: 'relative', zIndex: 1 } as const),
	}),
});

// --- [HOOK] ------------------------------------------------------------------

/** Store, registry and callbacks live for the scope's lifetime; only the config is recomputed. */
const useScopeHandle = (config: ScopeConfig): HoverScopeHandle => {
	const container = useRef<HTMLDivElement | null>(null);
	const core = useRef<ScopeCore | null>(null);
	core.current ??= ((): ScopeCore => {
		const store = createHoverStore();
		return {
			onHover: (target) => store.getState().hover(target),
			onHoverExit: (target) => store.getState().exit(target.id),
			regions: createRegionRegistry(),
			store,
		};
	})();
	const stable = core.current;
	return useMemo<HoverScopeHandle>(() => ({ ...stable, config, container }), [config, stable]);
};

// --- [ENTRY_POINT] -----------------------------------------------------------

const HoverScopeRoot: FC<HoverScopeProps> = ({
	children, className, inkDecoration, inkDuration, inkPhysics, style, tooltipDecoration, tooltipDelay, tooltipDuration, tooltipPhysics,
}) => {
	const config = useMemo(() => {
		const options = {
			ink: { decoration: inkDecoration, duration: inkDuration, physics: inkPhysics },
			tooltip: { decoration: tooltipDecoration, delay: tooltipDelay, duration: tooltipDuration, physics: tooltipPhysics },
		};
		Config.validate(options);
		return Config.scope(options);
	}, [inkDecoration, inkDuration, inkPhysics, tooltipDecoration, tooltipDelay, tooltipDuration, tooltipPhysics]);
	const handle = useScopeHandle(config);
	const onMouseMove = (event: MouseEvent<HTMLDivElement>): void => {
		event.target instanceof Node && handle.regions.dispatch(event.target);
	};
	const onMouseLeave = (): void => handle.regions.dispatch(null);
	return (
		<HoverScopeContext.Provider value={handle}>
			<div
				className={cn(className)}
				data-slot='hover-scope'
				onMouseLeave={onMouseLeave}
				onMouseMove={onMouseMove}
				ref={handle.container}
				style={{ ...B.style.container, ...style }}
			>
				<Ink />
				<div data-slot='hover-scope-content' style={B.style.content}>
					<RegionParentContext.Provider value={null}>{children}</RegionParentContext.Provider>
				</div>
				<Tooltip />
			</div>
		</HoverScopeContext.Provider>
	);
};
const HoverScope = Object.assign(HoverScopeRoot, {
	/** Nearest enclosing scope handle; throws HoverError MISSING_SCOPE outside one. */
	use: useHoverScope,
	useTarget: useHoverTarget,
});

// --- [EXPORT] ----------------------------------------------------------------

export { B as HOVER_SCOPE_TUNING, HoverScope };
export type { HoverScopeProps };
