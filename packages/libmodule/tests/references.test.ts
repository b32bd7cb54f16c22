// tests/references.test.ts — Tests for resource references and the registry
import { describe, it, expect } from 'vitest';
import {
    resource, isResourceHandle, ResourceHandle, ResourceRegistry,
    resolveReference, resolveOptionalReference,
    UnknownResourceError, DuplicateResourceError,
} from '../src/index.js';

describe('resource', () => {
    it('creates a frozen handle', () => {
        const handle = resource('azure-resource-group', 'def-group');
        expect(handle).toBeInstanceOf(ResourceHandle);
        expect(handle.kind).toBe('azure-resource-group');
        expect(handle.name).toBe('def-group');
        expect(Object.isFrozen(handle)).toBe(true);
        expect(String(handle)).toBe('azure-resource-group:def-group');
    });

    it('is recognized by isResourceHandle', () => {
        expect(isResourceHandle(resource('k', 'n'))).toBe(true);
        expect(isResourceHandle({ kind: 'k', name: 'n' })).toBe(false);
        expect(isResourceHandle('k:n')).toBe(false);
    });
});

describe('ResourceRegistry', () => {
    it('looks resources up by kind and name', () => {
        const registry = new ResourceRegistry<{ id: string }>()
            .register('azure-resource-group', 'def-group', { id: 'rg-1' });
        expect(registry.lookup('azure-resource-group', 'def-group')).toEqual({ id: 'rg-1' });
        expect(registry.lookup('azure-network-security-group', 'def-group')).toBeUndefined();
        expect(registry.has('azure-resource-group', 'def-group')).toBe(true);
    });

    it('rejects duplicate declarations', () => {
        const registry = new ResourceRegistry<number>().register('k', 'n', 1);
        expect(() => registry.register('k', 'n', 2)).toThrow(DuplicateResourceError);
    });
});

describe('resolveReference', () => {
    it('returns strings as literal identifiers without a lookup', () => {
        const registry = new ResourceRegistry<string>();
        expect(resolveReference('/subscriptions/x/resourceGroups/rg', registry)).toEqual({
            type: 'literal',
            id: '/subscriptions/x/resourceGroups/rg',
        });
    });

    it('resolves handles against the registry', () => {
        const registry = new ResourceRegistry<string>().register('azure-resource-group', 'def-group', 'rg-1');
        expect(resolveReference(resource('azure-resource-group', 'def-group'), registry)).toEqual({
            type: 'handle',
            kind: 'azure-resource-group',
            name: 'def-group',
            resource: 'rg-1',
        });
    });

    it('fails on unknown resources', () => {
        const registry = new ResourceRegistry<string>();
        const attempt = () => resolveReference(resource('azure-resource-group', 'missing'), registry);
        expect(attempt).toThrow(UnknownResourceError);
        expect(attempt).toThrow(expect.objectContaining({
            kind: 'azure-resource-group',
            resourceName: 'missing',
            code: 'UNKNOWN_RESOURCE',
        }));
    });

    it('resolves forward references registered after the handle was made', () => {
        const registry = new ResourceRegistry<string>();
        const handle = resource('azure-network-security-group', 'web');
        registry.register('azure-network-security-group', 'web', 'nsg-1');
        expect(resolveReference(handle, registry)).toMatchObject({ type: 'handle', resource: 'nsg-1' });
    });
});

describe('resolveOptionalReference', () => {
    it('maps null to null', () => {
        expect(resolveOptionalReference(null, new ResourceRegistry())).toBe(null);
    });
});
