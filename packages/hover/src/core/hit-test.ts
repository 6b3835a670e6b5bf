/**
 * Exclusive hit-testing for nested hover regions.
 * A claim object is threaded through one pass: every containing region observes the probe,
 * but only the innermost hit region is recorded as an entry. The outermost region of the pass
 * resets the claim when it finishes, so passes never leak state into each other.
 */

// --- [TYPES] -----------------------------------------------------------------

type HitRegion<P> = {
	readonly children: ReadonlyArray<HitRegion<P>>;
	readonly contains: (probe: P) => boolean;
	readonly id: string;
	readonly opaque: boolean;
};
type HitClaim = { innermostFound: boolean; outermost: boolean };
type HitResult = { readonly contained: string[]; readonly entries: string[] };

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const makeClaim = (): HitClaim => ({ innermostFound: false, outermost: true });
const makeResult = (): HitResult => ({ contained: [], entries: [] });
/** Last child paints on top, so it is tested first; stops at the first hit. */
const hitTestChildren = <P>(children: ReadonlyArray<HitRegion<P>>, probe: P, claim: HitClaim, result: HitResult): boolean =>
	[...children].reverse().some((child) => hitTest(child, probe, claim, result));
const hitTest = <P>(region: HitRegion<P>, probe: P, claim: HitClaim, result: HitResult): boolean => {
	const outermost = claim.outermost;
	claim.outermost = false;
	const contained = region.contains(probe);
	contained && result.contained.push(region.id);
	const isHit = contained && (hitTestChildren(region.children, probe, claim, result) || region.opaque);
	const claims = contained && (isHit || !region.opaque) && !claim.innermostFound;
	claims && (claim.innermostFound = true) && result.entries.push(region.id);
	outermost && Object.assign(claim, makeClaim());
	return isHit;
};
/** Sibling roots share one claim: the pass itself acts as the outermost region. */
const pass = <P>(roots: ReadonlyArray<HitRegion<P>>, probe: P, claim: HitClaim = makeClaim()): HitResult => {
	const result = makeResult();
	claim.outermost = false;
	hitTestChildren(roots, probe, claim, result);
	Object.assign(claim, makeClaim());
	return result;
};

// --- [ENTRY_POINT] -----------------------------------------------------------

const HitTest = Object.freeze({ hitTest, makeClaim, pass });

// --- [EXPORT] ----------------------------------------------------------------

export { HitTest };
export type { HitClaim, HitRegion, HitResult };
