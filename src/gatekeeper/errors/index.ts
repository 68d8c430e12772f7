export * from './gatekeeper.error';
export * from './error-details';
