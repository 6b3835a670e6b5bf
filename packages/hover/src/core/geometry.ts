/**
 * Overlay geometry: element measurement relative to a scope container, ink rectangle, tooltip anchor.
 */

// --- [TYPES] -----------------------------------------------------------------

type Point = { readonly x: number; readonly y: number };
type Size = { readonly height: number; readonly width: number };
type Rect = { readonly height: number; readonly left: number; readonly top: number; readonly width: number };
type Placement = 'above' | 'below';
type Measurement = { readonly offset: Point; readonly origin: Point; readonly size: Size };
type Anchor = { readonly left: number; readonly placement: Placement; readonly top: number };

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Center of `element` in `container` coordinates, plus the container's viewport origin. */
const measure = (element: Element, container: Element): Measurement => {
	const box = element.getBoundingClientRect();
	const frame = container.getBoundingClientRect();
	return {
		offset: { x: box.left - frame.left + box.width / 2, y: box.top - frame.top + box.height / 2 },
		origin: { x: frame.left, y: frame.top },
		size: { height: box.height, width: box.width },
	};
};
const inkRect = (size: Size, offset: Point): Rect => ({
	height: size.height,
	left: offset.x - size.width / 2,
	top: offset.y - size.height / 2,
	width: size.width,
});
/** Flips above the target when its center sits in the lower half of the viewport. */
const tooltipAnchor = (target: Measurement, viewportHeight: number, gap: number): Anchor => {
	const placement: Placement = target.offset.y + target.origin.y > viewportHeight / 2 ? 'above' : 'below';
	const reach = target.size.height / 2 + gap;
	return {
		left: target.offset.x,
		placement,
		top: placement === 'above' ? target.offset.y - reach : target.offset.y + reach,
	};
};

// --- [ENTRY_POINT] -----------------------------------------------------------

const Geometry = Object.freeze({ inkRect, measure, tooltipAnchor });

// --- [EXPORT] ----------------------------------------------------------------

export { Geometry };
export type { Anchor, Measurement, Placement, Point, Rect, Size };
