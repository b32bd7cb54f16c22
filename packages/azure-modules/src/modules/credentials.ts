// azure-modules/src/modules/credentials.ts — Azure management credentials
//
// Merged into the option set of every Azure resource module. Empty values
// make the deployment backend fall back to its environment.

import { mkOption, types } from 'libmodule';

export function azureCredentialOptions(resourceDescription: string) {
    return {
        subscriptionId: mkOption({
            type: types.str,
            default: '',
            example: '00000000-0000-0000-0000-000000000000',
            description:
                `The Azure subscription ID used to manage the ${resourceDescription}. ` +
                'Leave empty to use the AZURE_SUBSCRIPTION_ID environment variable.',
        }),

        authority: mkOption({
            type: types.str,
            default: '',
            example: 'https://login.windows.net/example-tenant.onmicrosoft.com',
            description:
                `The Azure authority URL used to manage the ${resourceDescription}. ` +
                'Leave empty to use the AZURE_AUTHORITY_URL environment variable.',
        }),

        identifierUri: mkOption({
            type: types.str,
            default: 'https://management.azure.com/',
            description: `The URI that identifies the resource for which the ${resourceDescription} token is valid.`,
        }),

        appId: mkOption({
            type: types.str,
            default: '',
            example: '11111111-1111-1111-1111-111111111111',
            description:
                `The ID of the registered application used to manage the ${resourceDescription}. ` +
                'Leave empty to use the AZURE_ACTIVE_DIR_APP_ID environment variable.',
        }),

        appKey: mkOption({
            type: types.str,
            default: '',
            example: 'test-secret',
            description:
                `The secret key of the application used to manage the ${resourceDescription}. ` +
                'Leave empty to use the AZURE_ACTIVE_DIR_APP_KEY environment variable.',
        }),
    };
}
