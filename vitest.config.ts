import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            SOAP_ENDPOINT: 'http://127.0.0.1:9/',
            SOAP_USERNAME: 'kiosk',
            SOAP_PASSWORD: 'test-secret',
            SOAP_CLIENT_ID: '185',
        },
    },
});
