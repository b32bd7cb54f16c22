// azure-modules/src/lib/kinds.ts — resource kind tags shared between modules

export const AZURE_RESOURCE_GROUP = 'azure-resource-group';
export const AZURE_NETWORK_SECURITY_GROUP = 'azure-network-security-group';
export const AZURE_VIRTUAL_NETWORK = 'azure-virtual-network';

/** Resource group every Azure resource lands in unless told otherwise. */
export const DEFAULT_RESOURCE_GROUP = 'def-group';

/** Prefix of generated Azure resource names. */
export const RESOURCE_NAME_PREFIX = 'deploy';

/** `<prefix>-<deployment uuid>-<resource name>` */
export function defaultResourceName(uuid: string, name: string): string {
    return `${RESOURCE_NAME_PREFIX}-${uuid}-${name}`;
}
