export const ENCODER_CLASSES = 'ENCODER_CLASSES';
export const FEATURE_ENCODER = 'FEATURE_ENCODER';
export const PRICE_MODEL = 'PRICE_MODEL';
export const MODEL_METADATA = 'MODEL_METADATA';
