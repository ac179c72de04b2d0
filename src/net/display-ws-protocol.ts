import type { Frame } from '../ui/frame';

export type DisplayRelayHello = {
	type: 'hello';
	token?: string;
};

export type DisplayRelayStatus = {
	type: 'prompter-display-status';
	connected: number;
};

export type DisplayRelayFrame = {
	type: 'prompter-frame';
	frame: Frame;
	ts: number;
};

export type DisplayRelayMessage = DisplayRelayStatus | DisplayRelayFrame;

export interface DisplayRelayOptions {
	port: number;
	host?: string;
	/** Displays must present this in their hello when set. */
	token?: string | null;
}

export const DISPLAY_WS_PATH = '/ws/display';
export const DISPLAY_STATUS_PATH = '/display/status';

export function parseHello(raw: string): DisplayRelayHello | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return null;
	}
	if (!parsed || typeof parsed !== 'object') return null;
	if (!('type' in parsed) || parsed.type !== 'hello') return null;
	const token = 'token' in parsed && typeof parsed.token === 'string' ? parsed.token : undefined;
	return { type: 'hello', token };
}
