// tests/credentials.test.ts — Tests for the shared Azure credential options
import { describe, it, expect } from 'vitest';
import { resolve, isMandatory } from 'libmodule';
import { azureCredentialOptions } from '../src/index.js';

describe('azureCredentialOptions', () => {
    const options = azureCredentialOptions('storage account');

    it('declares no mandatory options', () => {
        expect(Object.values(options).filter(isMandatory)).toEqual([]);
    });

    it('mentions the resource in its descriptions', () => {
        expect(options.subscriptionId.description).toContain('storage account');
    });

    it('defaults to the environment-backed empty values', () => {
        expect(resolve(options, [])).toEqual({
            subscriptionId: '',
            authority: '',
            identifierUri: 'https://management.azure.com/',
            appId: '',
            appKey: '',
        });
    });

    it('takes explicit credentials', () => {
        const config = resolve(options, [{ path: 'appKey', value: 'test-secret', priority: 100 }]);
        expect(config.appKey).toBe('test-secret');
    });
});
