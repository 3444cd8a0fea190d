export const SERVER_NAME = 'outputcheck';
export const SERVER_VERSION = '0.1.0';
