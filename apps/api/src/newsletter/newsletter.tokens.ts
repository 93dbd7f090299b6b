/** Injection tokens for the pipeline's collaborators. */
export const LIBRARY_SOURCE = Symbol('LIBRARY_SOURCE');
export const ENRICHMENT_CLIENT = Symbol('ENRICHMENT_CLIENT');
export const DIGEST_DELIVERY = Symbol('DIGEST_DELIVERY');
export const TEMPLATE_ROOT = Symbol('TEMPLATE_ROOT');
