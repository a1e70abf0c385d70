// World constants
export const CHUNK_SIZE = 16;
export const DEFAULT_PRELOAD_RADIUS = 1;

// Location name constraints
export const LOCATION_NAME_MIN_LENGTH = 2;
export const LOCATION_NAME_MAX_LENGTH = 50;
export const LOCATION_DESCRIPTION_MAX_LENGTH = 500;
