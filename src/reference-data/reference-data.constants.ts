export const REFERENCE_DATA_SOURCE = 'REFERENCE_DATA_SOURCE';
