export const EVENT_HANDLER = Symbol('EVENT_HANDLER');
