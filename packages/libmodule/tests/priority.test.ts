// tests/priority.test.ts — Tests for the numeric priority system
import { describe, it, expect } from 'vitest';
import {
    mkOverride, mkDefault, mkForce,
    isOverride,
    DEFAULT_PRIORITY, MKDEFAULT_PRIORITY, MKFORCE_PRIORITY, OPTION_DEFAULT_PRIORITY,
    Priority,
} from '../src/index.js';

// ─── Constants ──────────────────────────────────────────────────────

describe('priority constants', () => {
    it('mkForce < bare < mkDefault < option default (lower = higher precedence)', () => {
        expect(MKFORCE_PRIORITY).toBe(50);
        expect(DEFAULT_PRIORITY).toBe(100);
        expect(MKDEFAULT_PRIORITY).toBe(1000);
        expect(OPTION_DEFAULT_PRIORITY).toBe(1500);
        expect(MKFORCE_PRIORITY).toBeLessThan(DEFAULT_PRIORITY);
        expect(DEFAULT_PRIORITY).toBeLessThan(MKDEFAULT_PRIORITY);
        expect(MKDEFAULT_PRIORITY).toBeLessThan(OPTION_DEFAULT_PRIORITY);
    });

    it('names the three levels', () => {
        expect(Priority).toEqual({ Force: 50, Normal: 100, Default: 1000 });
    });
});

// ─── mkOverride ─────────────────────────────────────────────────────

describe('mkOverride', () => {
    it('wraps with explicit numeric priority', () => {
        const w = mkOverride(200, 'hello');
        expect(w.__type).toBe('override');
        expect(w.priority).toBe(200);
        expect(w.value).toBe('hello');
    });

    it('supports any priority value', () => {
        expect(mkOverride(0, 'x').priority).toBe(0);
        expect(mkOverride(9999, 'x').priority).toBe(9999);
        expect(mkOverride(-1, 'x').priority).toBe(-1);
    });
});

// ─── mkDefault / mkForce ────────────────────────────────────────────

describe('mkDefault', () => {
    it('wraps with priority 1000', () => {
        const w = mkDefault(42);
        expect(w.priority).toBe(1000);
        expect(w.value).toBe(42);
    });

    it('can wrap falsy values', () => {
        expect(mkDefault(0).value).toBe(0);
        expect(mkDefault(null).value).toBe(null);
        expect(mkDefault('').value).toBe('');
        expect(mkDefault(false).value).toBe(false);
    });
});

describe('mkForce', () => {
    it('wraps with priority 50', () => {
        const w = mkForce('forced');
        expect(w.priority).toBe(50);
        expect(w.value).toBe('forced');
    });

    it('keeps complex values by reference', () => {
        const arr = ['10.0.0.0/8'];
        expect(mkForce(arr).value).toBe(arr);
    });
});

// ─── isOverride ─────────────────────────────────────────────────────

describe('isOverride', () => {
    it('detects priority wrappers', () => {
        expect(isOverride(mkDefault(1))).toBe(true);
        expect(isOverride(mkForce(1))).toBe(true);
        expect(isOverride(mkOverride(42, 1))).toBe(true);
    });

    it('rejects other values', () => {
        expect(isOverride(null)).toBe(false);
        expect(isOverride(undefined)).toBe(false);
        expect(isOverride(42)).toBe(false);
        expect(isOverride('str')).toBe(false);
        expect(isOverride({})).toBe(false);
        expect(isOverride([])).toBe(false);
        expect(isOverride({ __type: 'if' })).toBe(false);
        expect(isOverride({ __type: 'override' })).toBe(false);
    });
});
