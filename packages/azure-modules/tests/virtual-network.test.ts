// tests/virtual-network.test.ts — Tests for the Azure virtual network module
import { describe, it, expect } from 'vitest';
import {
    evalResource, mkDefault, resource, ResourceRegistry, Priority,
    ConflictingOverridesError, TypeMismatchError, UnknownResourceError,
} from 'libmodule';
import {
    virtualNetwork, resolveNetworkReferences,
    AZURE_NETWORK_SECURITY_GROUP, AZURE_RESOURCE_GROUP,
} from '../src/index.js';

function network(definitions: Record<string, unknown> | Array<Record<string, unknown>>) {
    return evalResource(virtualNetwork, { name: 'vnet', uuid: 'u1', definitions });
}

// ─── Defaults ───────────────────────────────────────────────────────

describe('virtualNetwork defaults', () => {
    it('fills in every optional field', () => {
        const result = network({ addressSpace: ['10.1.0.0/16'], location: 'westus' });

        expect(result.kind).toBe('azure-virtual-network');
        expect(result.name).toBe('vnet');
        expect(result.config).toEqual({
            subscriptionId: '',
            authority: '',
            identifierUri: 'https://management.azure.com/',
            appId: '',
            appKey: '',
            name: 'deploy-u1-vnet',
            resourceGroup: resource(AZURE_RESOURCE_GROUP, 'def-group'),
            location: 'westus',
            addressSpace: ['10.1.0.0/16'],
            tags: {},
            dnsServers: [],
            subnets: { default: { addressPrefix: '10.1.0.0/16', securityGroup: null } },
        });
    });

    it('uses the first address block for the default subnet', () => {
        const result = network({ addressSpace: ['10.1.0.0/16', '10.3.0.0/16'], location: 'westus' });
        expect(result.config.subnets).toEqual({
            default: { addressPrefix: '10.1.0.0/16', securityGroup: null },
        });
    });

    it('creates no subnet when the address space is empty', () => {
        const result = network({ addressSpace: [], location: 'westus' });
        expect(result.config.subnets).toEqual({});
    });

    it('keeps explicit names and resource groups', () => {
        const result = network({
            addressSpace: ['10.1.0.0/16'],
            location: 'westus',
            name: 'core-network',
            resourceGroup: 'core-group',
        });
        expect(result.config.name).toBe('core-network');
        expect(result.config.resourceGroup).toBe('core-group');
    });
});

// ─── Subnets ────────────────────────────────────────────────────────

describe('virtualNetwork subnets', () => {
    it('replaces the default subnet with user-defined subnets', () => {
        const result = network({
            addressSpace: ['10.1.0.0/16'],
            location: 'westus',
            subnets: { front: { addressPrefix: '10.1.1.0/24' } },
        });
        expect(result.config.subnets).toEqual({
            front: { addressPrefix: '10.1.1.0/24', securityGroup: null },
        });
    });

    it('merges user subnets given at default priority with the default subnet', () => {
        const result = network({
            addressSpace: ['10.1.0.0/16'],
            location: 'westus',
            subnets: mkDefault({ front: { addressPrefix: '10.1.1.0/24' } }),
        });
        expect(result.config.subnets).toEqual({
            default: { addressPrefix: '10.1.0.0/16', securityGroup: null },
            front: { addressPrefix: '10.1.1.0/24', securityGroup: null },
        });
    });

    it('applies a nested override to the default subnet', () => {
        const result = evalResource(virtualNetwork, {
            name: 'vnet',
            uuid: 'u1',
            definitions: { addressSpace: ['10.1.0.0/16'], location: 'westus' },
            overrides: [{ path: 'subnets.default.securityGroup', value: 'sg-id', priority: Priority.Default }],
        });
        expect(result.config.subnets).toEqual({
            default: { addressPrefix: '10.1.0.0/16', securityGroup: 'sg-id' },
        });
    });

    it('lets a user subnet map beat a nested Default override', () => {
        const result = evalResource(virtualNetwork, {
            name: 'vnet',
            uuid: 'u1',
            definitions: {
                addressSpace: ['10.1.0.0/16'],
                location: 'westus',
                subnets: { default: { addressPrefix: '10.1.8.0/24', securityGroup: 'user-sg' } },
            },
            overrides: [{ path: 'subnets.default.securityGroup', value: 'sg-id', priority: Priority.Default }],
        });
        expect(result.config.subnets).toEqual({
            default: { addressPrefix: '10.1.8.0/24', securityGroup: 'user-sg' },
        });
    });

    it('accepts security groups by identifier or declared resource', () => {
        const result = network({
            addressSpace: ['10.1.0.0/16'],
            location: 'westus',
            subnets: {
                web: { addressPrefix: '10.1.2.0/24', securityGroup: resource(AZURE_NETWORK_SECURITY_GROUP, 'web-nsg') },
                db: { addressPrefix: '10.1.3.0/24', securityGroup: '/subscriptions/x/networkSecurityGroups/db' },
            },
        });
        expect(result.config.subnets.web.securityGroup).toEqual(resource(AZURE_NETWORK_SECURITY_GROUP, 'web-nsg'));
        expect(result.config.subnets.db.securityGroup).toBe('/subscriptions/x/networkSecurityGroups/db');
    });

    it('rejects security groups of the wrong resource kind', () => {
        expect(() => network({
            addressSpace: ['10.1.0.0/16'],
            location: 'westus',
            subnets: { web: { addressPrefix: '10.1.2.0/24', securityGroup: resource(AZURE_RESOURCE_GROUP, 'web') } },
        })).toThrow(TypeMismatchError);
    });
});

// ─── Conflicts ──────────────────────────────────────────────────────

describe('virtualNetwork conflicts', () => {
    it('rejects two locations at the same priority', () => {
        try {
            network([
                { addressSpace: ['10.1.0.0/16'], location: 'westus' },
                { location: 'eastus' },
            ]);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConflictingOverridesError);
            expect((err as ConflictingOverridesError).path).toEqual(['location']);
            expect((err as ConflictingOverridesError).priority).toBe(100);
        }
    });

    it('accepts equal definitions at the same priority', () => {
        const result = network([
            { addressSpace: ['10.1.0.0/16'], location: 'westus' },
            { location: 'westus' },
        ]);
        expect(result.config.location).toBe('westus');
    });
});

// ─── References ─────────────────────────────────────────────────────

describe('resolveNetworkReferences', () => {
    it('dereferences declared resources', () => {
        const registry = new ResourceRegistry<{ id: string }>()
            .register(AZURE_RESOURCE_GROUP, 'def-group', { id: 'rg-1' })
            .register(AZURE_NETWORK_SECURITY_GROUP, 'web-nsg', { id: 'nsg-1' });
        const result = network({
            addressSpace: ['10.1.0.0/16'],
            location: 'westus',
            subnets: {
                web: { addressPrefix: '10.1.2.0/24', securityGroup: resource(AZURE_NETWORK_SECURITY_GROUP, 'web-nsg') },
                open: { addressPrefix: '10.1.4.0/24' },
            },
        });

        expect(resolveNetworkReferences(result, registry)).toEqual({
            resourceGroup: { type: 'handle', kind: AZURE_RESOURCE_GROUP, name: 'def-group', resource: { id: 'rg-1' } },
            subnetSecurityGroups: {
                web: { type: 'handle', kind: AZURE_NETWORK_SECURITY_GROUP, name: 'web-nsg', resource: { id: 'nsg-1' } },
                open: null,
            },
        });
    });

    it('passes identifiers through', () => {
        const result = network({
            addressSpace: ['10.1.0.0/16'],
            location: 'westus',
            resourceGroup: '/subscriptions/x/resourceGroups/core',
        });
        expect(resolveNetworkReferences(result, new ResourceRegistry())).toEqual({
            resourceGroup: { type: 'literal', id: '/subscriptions/x/resourceGroups/core' },
            subnetSecurityGroups: { default: null },
        });
    });

    it('fails when the resource group was never declared', () => {
        const result = network({ addressSpace: ['10.1.0.0/16'], location: 'westus' });
        expect(() => resolveNetworkReferences(result, new ResourceRegistry())).toThrow(UnknownResourceError);
    });
});
