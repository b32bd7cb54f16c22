// azure-modules/src/modules/virtual-network.ts — Azure virtual network with subnets

import {
    defineResource, deferred, mergeOptionSets, mkDefault, mkIf, mkOption,
    resolveOptionalReference, resolveReference, resource, types,
} from 'libmodule';
import type { ConfigOf, ResolvedResource, ResourceRef, ResourceRegistry } from 'libmodule';
import {
    AZURE_NETWORK_SECURITY_GROUP, AZURE_RESOURCE_GROUP, AZURE_VIRTUAL_NETWORK,
    DEFAULT_RESOURCE_GROUP, defaultResourceName,
} from '../lib/kinds.js';
import { azureCredentialOptions } from './credentials.js';

export const subnetOptions = {
    addressPrefix: mkOption({
        type: types.str,
        example: '10.1.0.0/24',
        description: 'Address prefix for the subnet in CIDR notation.',
    }),

    securityGroup: mkOption({
        type: types.nullOr(types.either(types.str, types.resource(AZURE_NETWORK_SECURITY_GROUP))),
        default: null,
        example: resource(AZURE_NETWORK_SECURITY_GROUP, 'my-security-group'),
        description:
            'The Azure resource ID or the declared resource of the network security group ' +
            'to apply to all NICs in the subnet.',
    }),
};

export const virtualNetworkOptions = mergeOptionSets(azureCredentialOptions('virtual network'), {
    name: mkOption({
        type: types.str,
        defaultText: 'deploy-<uuid>-<resource name>',
        example: 'my-network',
        description: 'Name of the Azure virtual network.',
    }),

    resourceGroup: mkOption({
        type: types.either(types.str, types.resource(AZURE_RESOURCE_GROUP)),
        defaultText: `resource "${AZURE_RESOURCE_GROUP}:${DEFAULT_RESOURCE_GROUP}"`,
        example: 'xxx-my-group',
        description: 'The name or declared resource of the Azure resource group to create the network in.',
    }),

    location: mkOption({
        type: types.str,
        example: 'westus',
        description: 'The Azure data center location where the virtual network should be created.',
    }),

    addressSpace: mkOption({
        type: types.listOf(types.str),
        example: ['10.1.0.0/16', '10.3.0.0/16'],
        description: 'The list of address blocks reserved for this virtual network in CIDR notation.',
    }),

    tags: mkOption({
        type: types.attrsOf(types.str),
        default: {},
        example: { environment: 'production' },
        description: 'Tag name/value pairs to associate with the virtual network.',
    }),

    dnsServers: mkOption({
        type: types.nullOr(types.listOf(types.str)),
        default: [],
        example: ['8.8.8.8', '8.8.4.4'],
        description:
            'List of DNS server IP addresses to provide via DHCP. ' +
            'Leave empty to provide the default Azure DNS servers.',
    }),

    subnets: mkOption({
        type: types.attrsOf(types.submodule(subnetOptions)),
        default: {},
        example: { default: { addressPrefix: '10.1.0.0/24' } },
        description: 'An attribute set of subnets.',
    }),
});

export type VirtualNetworkConfig = ConfigOf<typeof virtualNetworkOptions>;

export const virtualNetwork = defineResource({
    kind: AZURE_VIRTUAL_NETWORK,
    options: virtualNetworkOptions,
    config: (config, { name, uuid }) => ({
        name: mkDefault(defaultResourceName(uuid, name)),
        resourceGroup: mkDefault(resource(AZURE_RESOURCE_GROUP, DEFAULT_RESOURCE_GROUP)),
        // A network with an address space gets one subnet spanning its first block.
        subnets: mkIf(
            () => config.addressSpace.length > 0,
            mkDefault(deferred(() => ({
                default: { addressPrefix: config.addressSpace[0] },
            }))),
        ),
    }),
});

export interface NetworkReferences<R> {
    readonly resourceGroup: ResourceRef<R>;
    readonly subnetSecurityGroups: Readonly<Record<string, ResourceRef<R> | null>>;
}

/** Dereference the resource fields of a resolved network. */
export function resolveNetworkReferences<R>(
    network: ResolvedResource<typeof virtualNetworkOptions>,
    registry: ResourceRegistry<R>,
): NetworkReferences<R> {
    const subnetSecurityGroups: Record<string, ResourceRef<R> | null> = {};
    for (const [subnet, { securityGroup }] of Object.entries(network.config.subnets)) {
        subnetSecurityGroups[subnet] = resolveOptionalReference(securityGroup, registry);
    }
    return {
        resourceGroup: resolveReference(network.config.resourceGroup, registry),
        subnetSecurityGroups,
    };
}
