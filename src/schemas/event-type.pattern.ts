export const MAX_EVENT_TYPE_LENGTH = 256;

// Control characters would corrupt log lines and key prefixes.
export const EVENT_TYPE_PATTERN = /^[^\u0000-\u001f\u007f]+$/;
