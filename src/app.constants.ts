export const SERVICE_NAME = 'YouTube Link Resolver API';
export const SERVICE_VERSION = '1.0.0';
