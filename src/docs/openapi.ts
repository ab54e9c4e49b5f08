const errorResponse = (description: string) => ({
    description,
    content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});

export const openapiSpec = {
    openapi: '3.0.3',
    info: {
        title: 'Exposure Key Server API',
        version: '1.0.0',
        description:
            'Accepts batches of temporary exposure keys from authorized mobile applications. Keys are validated as a batch: any invalid key rejects the whole request.',
    },
    servers: [{ url: 'http://localhost:{port}', variables: { port: { default: '8080' } } }],
    components: {
        schemas: {
            Error: {
                type: 'object',
                properties: {
                    error: {
                        type: 'object',
                        properties: {
                            code: { type: 'string' },
                            message: { type: 'string' },
                            details: {},
                        },
                        required: ['code', 'message'],
                    },
                },
                required: ['error'],
            },
            ExposureKey: {
                type: 'object',
                properties: {
                    key: { type: 'string', description: 'base64 of the 16 byte temporary exposure key' },
                    rollingStartNumber: { type: 'integer', format: 'int32', description: 'start interval (unix seconds / 600)' },
                    rollingPeriod: { type: 'integer', minimum: 1, maximum: 144 },
                    transmissionRisk: { type: 'integer', minimum: 0, maximum: 8 },
                },
                required: ['key', 'rollingStartNumber', 'rollingPeriod', 'transmissionRisk'],
            },
            Publish: {
                type: 'object',
                properties: {
                    temporaryExposureKeys: {
                        type: 'array',
                        minItems: 1,
                        maxItems: 21,
                        items: { $ref: '#/components/schemas/ExposureKey' },
                    },
                    regions: { type: 'array', items: { type: 'string' } },
                    appPackageName: { type: 'string', description: 'Android package name or iOS bundle id' },
                    platform: { type: 'string', enum: ['ios', 'android'] },
                    deviceVerificationPayload: { type: 'string', description: 'platform attestation payload' },
                    verificationPayload: { type: 'string' },
                    padding: { type: 'string', description: 'ignored' },
                },
                required: ['temporaryExposureKeys', 'appPackageName', 'platform'],
            },
        },
    },
    paths: {
        '/health': {
            get: {
                summary: 'Health check',
                responses: { '200': { description: 'OK' } },
            },
        },
        '/v1/publish': {
            post: {
                summary: 'Publish temporary exposure keys',
                requestBody: {
                    required: true,
                    content: { 'application/json': { schema: { $ref: '#/components/schemas/Publish' } } },
                },
                responses: {
                    '200': {
                        description: 'Keys stored',
                        content: {
                            'application/json': {
                                schema: {
                                    type: 'object',
                                    properties: {
                                        data: {
                                            type: 'object',
                                            properties: { insertedExposures: { type: 'integer' } },
                                            required: ['insertedExposures'],
                                        },
                                    },
                                    required: ['data'],
                                },
                            },
                        },
                    },
                    '400': errorResponse('Invalid request or key data'),
                    '401': errorResponse('App, region or attestation not authorized'),
                    '429': errorResponse('Rate limited'),
                    '500': errorResponse('Storage failure'),
                },
            },
        },
    },
} as const;
