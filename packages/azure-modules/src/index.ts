// azure-modules/src/index.ts — Azure resource modules

export {
    AZURE_NETWORK_SECURITY_GROUP,
    AZURE_RESOURCE_GROUP,
    AZURE_VIRTUAL_NETWORK,
    DEFAULT_RESOURCE_GROUP,
    RESOURCE_NAME_PREFIX,
    defaultResourceName,
} from './lib/kinds.js';
export { azureCredentialOptions } from './modules/credentials.js';
export {
    resolveNetworkReferences,
    subnetOptions,
    virtualNetwork,
    virtualNetworkOptions,
} from './modules/virtual-network.js';
export type { NetworkReferences, VirtualNetworkConfig } from './modules/virtual-network.js';
