export const GATEKEEPER_OPTIONS = 'GATEKEEPER_OPTIONS';
export const CLOCK = 'GATEKEEPER_CLOCK';
export const FILE_STORE = 'GATEKEEPER_FILE_STORE';
