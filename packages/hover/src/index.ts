export { CONFIG_TUNING, Config } from './core/config.ts';
export type { HoverOverrides, MotionOptions, ResolvedInk, ResolvedTooltip, ScopeConfig, ScopeOptions, TooltipContent, TooltipOptions } from './core/config.ts';
export { DECORATION_TUNING, Decoration } from './core/decoration.ts';
export type { DecorationStyle } from './core/decoration.ts';
export { HOVER_ERRORS, HoverError } from './core/errors.ts';
export type { HoverErrorCode } from './core/errors.ts';
export { Geometry } from './core/geometry.ts';
export type { Anchor, Measurement, Placement, Point, Rect, Size } from './core/geometry.ts';
export { HitTest } from './core/hit-test.ts';
export type { HitClaim, HitRegion, HitResult } from './core/hit-test.ts';
export { PHYSICS_TUNING, Physics } from './core/physics.ts';
export type { Bezier, Ease, SpringParams } from './core/physics.ts';
export { HOVERABLE_TUNING, Hoverable, matchShortcut } from './hoverable/hoverable.tsx';
export type { HoverableProps, HoverableRender, HoverableState } from './hoverable/hoverable.tsx';
export type { HoverScopeHandle } from './scope/context.ts';
export { Overlay, useOverlayFrame, useRevealGate } from './scope/overlay.ts';
export type { OverlayFrame, OverlayPhase } from './scope/overlay.ts';
export { HOVER_SCOPE_TUNING, HoverScope } from './scope/scope.tsx';
export type { HoverScopeProps } from './scope/scope.tsx';
export type { HoverTarget } from './scope/store.ts';
