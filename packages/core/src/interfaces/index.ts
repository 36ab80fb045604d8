export type {
	CallbackEvent,
	CallbackEventHandler,
	CallbackReply,
} from './event-handler.interface.js';
