/**
 * Config tests: scope defaults, CSS custom-property fallbacks, per-target resolution and tooltip content.
 */
import { describe, expect, it, vi } from 'vitest';
import { Config, CONFIG_TUNING } from '../src/core/config.ts';
import { Decoration } from '../src/core/decoration.ts';
import { Physics } from '../src/core/physics.ts';

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const stubCssVars = (vars: Readonly<Record<string, string>>): void => {
    const declaration = document.createElement('div').style;
    Object.entries(vars).forEach(([name, value]) => declaration.setProperty(name, value));
    vi.spyOn(globalThis, 'getComputedStyle').mockReturnValue(declaration);
};
const thrown = (fn: () => unknown): unknown => {
    try {
        fn();
        return undefined;
    } catch (e) {
        return e;
    }
};

// --- [DESCRIBE] Config.scope -------------------------------------------------

describe('Config.scope', () => {
    it('falls back to built-in defaults', () => {
        const config = Config.scope({});
        expect(config.gap).toBe(24);
        expect(config.grace).toBe(300);
        expect(config.ink.decoration).toBe(Decoration.defaults.ink);
        expect(config.ink.physics).toBe(Physics.presets.gentle);
        expect(config.tooltip.decoration).toBe(Decoration.defaults.tooltip);
        expect(config.tooltip.delay).toBe(1000);
    });
    it('reads CSS custom properties when the scope sets nothing', () => {
        stubCssVars({ '--hover-release-delay': '120ms', '--hover-tooltip-delay': '450ms', '--hover-tooltip-gap': '12px' });
        const config = Config.scope({});
        expect(config.tooltip.delay).toBe(450);
        expect(config.grace).toBe(120);
        expect(config.gap).toBe(12);
    });
    it('prefers the scope delay over the CSS custom property', () => {
        stubCssVars({ '--hover-tooltip-delay': '450ms' });
        expect(Config.scope({ tooltip: { delay: 250 } }).tooltip.delay).toBe(250);
    });
    it('exposes its defaults in CONFIG_TUNING', () => {
        expect(CONFIG_TUNING.defaults).toMatchObject({ delay: 1000, gap: 24, grace: 300, padding: 8 });
    });
});

// --- [DESCRIBE] Config.resolveInk --------------------------------------------

describe('Config.resolveInk', () => {
    it('uses scope defaults without an override', () => {
        expect(Config.resolveInk(undefined, Config.scope({}))).toEqual({
            decoration: Decoration.defaults.ink,
            transition: { bounce: 0.05, duration: 0.3, type: 'spring' },
        });
    });
    it('uses the scope physics when the hoverable sets none', () => {
        const config = Config.scope({ ink: { physics: Physics.presets.snappy } });
        expect(Config.resolveInk({}, config).transition).toEqual({ bounce: 0.15, duration: 0.2, type: 'spring' });
    });
    it('lets the hoverable override physics and duration', () => {
        const config = Config.scope({ ink: { physics: Physics.presets.snappy } });
        expect(Config.resolveInk({ duration: 150, physics: Physics.curve('linear') }, config).transition).toEqual({
            duration: 0.15,
            ease: 'linear',
            type: 'tween',
        });
    });
    it('applies a hoverable duration to the scope spring', () => {
        expect(Config.resolveInk({ duration: 500 }, Config.scope({})).transition).toEqual({ bounce: 0.05, duration: 0.5, type: 'spring' });
    });
    it('lets the hoverable override the decoration', () => {
        const decoration = { borderRadius: 2, color: 'rgb(1, 2, 3)' };
        expect(Config.resolveInk({ decoration }, Config.scope({})).decoration).toBe(decoration);
    });
});

// --- [DESCRIBE] Config.resolveTooltip ----------------------------------------

describe('Config.resolveTooltip', () => {
    const config = Config.scope({});
    it('prefers text over rich content', () => {
        expect(Config.resolveTooltip('a', { rich: 'Rich', text: 'Plain' }, config).content).toEqual({ key: 'text:Plain', node: 'Plain' });
    });
    it('keys rich content by hoverable id and revision', () => {
        expect(Config.resolveTooltip('a', { rich: 'Rich' }, config).content).toEqual({ key: 'rich:a#0', node: 'Rich' });
        expect(Config.resolveTooltip('a', { revision: 2, rich: 'Rich' }, config).content).toEqual({ key: 'rich:a#2', node: 'Rich' });
    });
    it('has no content without a target', () => {
        expect(Config.resolveTooltip(null, { text: 'Plain' }, config).content).toBeNull();
    });
    it('has no content when the hoverable sets neither text nor rich content', () => {
        expect(Config.resolveTooltip('a', {}, config).content).toBeNull();
    });
    it('keeps an explicit zero delay', () => {
        expect(Config.resolveTooltip('a', { delay: 0 }, config).delay).toBe(0);
    });
    it('falls back to the scope delay', () => {
        expect(Config.resolveTooltip('a', {}, Config.scope({ tooltip: { delay: 250 } })).delay).toBe(250);
    });
});

// --- [DESCRIBE] Config.validate ----------------------------------------------

describe('Config.validate', () => {
    it('rejects a curve without a duration at either level', () => {
        expect(thrown(() => Config.validate({ ink: { physics: Physics.curve('easeIn') } }))).toMatchObject({ code: 'MISSING_DURATION' });
        expect(thrown(() => Config.validate({ tooltip: { physics: Physics.curve('easeIn') } }))).toMatchObject({ code: 'MISSING_DURATION' });
    });
    it('accepts a curve with a duration', () => {
        expect(() => Config.validate({ ink: { duration: 100, physics: Physics.curve('easeIn') } })).not.toThrow();
    });
});

// --- [DESCRIBE] content transition -------------------------------------------

describe('content transition', () => {
    it('defaults to 300ms easeInOut', () => {
        expect(Config.resolveTooltip('a', {}, Config.scope({})).contentTransition).toEqual({ duration: 0.3, ease: 'easeInOut', type: 'tween' });
    });
    it('takes the hoverable tooltip duration', () => {
        expect(Config.resolveTooltip('a', { duration: 150 }, Config.scope({})).contentTransition).toEqual({ duration: 0.15, ease: 'easeInOut', type: 'tween' });
    });
    it('falls back to the scope tooltip duration', () => {
        const config = Config.scope({ tooltip: { duration: 450 } });
        expect(Config.resolveTooltip(null, undefined, config).contentTransition).toEqual({ duration: 0.45, ease: 'easeInOut', type: 'tween' });
    });
});
