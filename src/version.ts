export const LIB_VERSION = '1.0.0';
export const USER_AGENT = `Node/${LIB_VERSION}`;
