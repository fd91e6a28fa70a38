/**
 * Identity this client presents to the compatibility table.
 * Keep CLIENT_VERSION in step with package.json.
 */
export const CLIENT_NAME = 'ophys-cloud-cache';
export const CLIENT_VERSION = '2.10.0';
