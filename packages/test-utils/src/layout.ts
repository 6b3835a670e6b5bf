/**
 * Layout stubs: jsdom has no layout engine, so element boxes are stubbed per element.
 */
import { vi } from 'vitest';

// --- [TYPES] -----------------------------------------------------------------

type Box = { readonly height: number; readonly left: number; readonly top: number; readonly width: number };

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const toRect = ({ height, left, top, width }: Box): DOMRect => ({
    bottom: top + height,
    height,
    left,
    right: left + width,
    toJSON: () => ({ height, left, top, width }),
    top,
    width,
    x: left,
    y: top,
});
/** getBoundingClientRect of `element` returns `box` until mocks are restored. */
const stubBox = (element: Element, box: Box): void => {
    vi.spyOn(element, 'getBoundingClientRect').mockReturnValue(toRect(box));
};
const Layout = Object.freeze({ stubBox, toRect });

// --- [EXPORT] ----------------------------------------------------------------

export { Layout as TEST_LAYOUT };
export type { Box };
