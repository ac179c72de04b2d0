import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Socket } from 'node:net';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { debugLog, warnLog } from '../env/logging';
import type { Frame, PresentationSink } from '../ui/frame';
import {
	DISPLAY_STATUS_PATH,
	DISPLAY_WS_PATH,
	parseHello,
	type DisplayRelayFrame,
	type DisplayRelayOptions,
	type DisplayRelayStatus,
} from './display-ws-protocol';

const DEFAULT_HOST = '127.0.0.1';

function rawText(data: RawData): string {
	if (Buffer.isBuffer(data)) return data.toString('utf8');
	if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
	return Buffer.from(data).toString('utf8');
}

/**
 * Mirrors prompter frames to other screens over WebSocket. Displays connect
 * to /ws/display, say hello (with the token when one is configured) and then
 * receive every frame; the latest frame is replayed on connect.
 */
export interface DisplayRelay extends PresentationSink {
	listen(): Promise<number>;
	close(): Promise<void>;
	getConnectedDisplays(): number;
}

export function createDisplayRelay(options: DisplayRelayOptions): DisplayRelay {
	const host = options.host || DEFAULT_HOST;
	const token = options.token || null;
	const displayClients = new Set<WebSocket>();
	const wss = new WebSocketServer({ noServer: true });
	let lastFrame: string | null = null;
	let lastFrameAt = 0;

	const sendJson = (res: ServerResponse, status: number, body: unknown) => {
		res.statusCode = status;
		res.setHeader('Content-Type', 'application/json; charset=utf-8');
		res.setHeader('Cache-Control', 'no-store');
		res.end(JSON.stringify(body));
	};

	const handleApi = (req: IncomingMessage, res: ServerResponse) => {
		const pathname = (req.url || '/').split('?')[0];
		if (req.method === 'GET' && pathname === DISPLAY_STATUS_PATH) {
			sendJson(res, 200, { connectedDisplays: displayClients.size, lastFrameAt });
			return;
		}
		sendJson(res, 404, { error: 'not found' });
	};

	const server = http.createServer(handleApi);

	const sendTo = (client: WebSocket, payload: string) => {
		try {
			client.send(payload);
		} catch (err) {
			debugLog('display-relay', 'send failed', err);
		}
	};

	const broadcastStatus = () => {
		const status: DisplayRelayStatus = { type: 'prompter-display-status', connected: displayClients.size };
		const payload = JSON.stringify(status);
		for (const client of displayClients) sendTo(client, payload);
	};

	const handleWsConnection = (ws: WebSocket) => {
		let joined = false;
		const cleanup = () => {
			if (!joined) return;
			joined = false;
			displayClients.delete(ws);
			broadcastStatus();
			debugLog('display-relay', 'display left', { connected: displayClients.size });
		};
		ws.on('message', (data: RawData) => {
			if (joined) return;
			const hello = parseHello(rawText(data));
			if (!hello) {
				ws.close(1002, 'expected hello');
				return;
			}
			if (token && hello.token !== token) {
				ws.close(4003, 'invalid token');
				return;
			}
			joined = true;
			displayClients.add(ws);
			broadcastStatus();
			if (lastFrame) sendTo(ws, lastFrame);
			debugLog('display-relay', 'display joined', { connected: displayClients.size });
		});
		ws.on('close', cleanup);
		ws.on('error', cleanup);
	};

	const handleUpgrade = (req: IncomingMessage, socket: Socket, head: Buffer) => {
		const path = (req.url || '/').split('?')[0];
		if (path !== DISPLAY_WS_PATH) {
			socket.destroy();
			return;
		}
		wss.handleUpgrade(req, socket, head, (ws) => {
			handleWsConnection(ws);
		});
	};

	server.on('upgrade', handleUpgrade);

	return {
		listen() {
			return new Promise<number>((resolve, reject) => {
				const onError = (err: Error) => {
					server.off('listening', onListening);
					reject(err);
				};
				const onListening = () => {
					server.off('error', onError);
					const address = server.address();
					const port = address && typeof address === 'object' ? address.port : options.port;
					debugLog('display-relay', `listening on ws://${host}:${port}${DISPLAY_WS_PATH}`);
					resolve(port);
				};
				server.once('error', onError);
				server.once('listening', onListening);
				server.listen(options.port, host);
			});
		},
		render(frame: Frame) {
			lastFrameAt = Date.now();
			const message: DisplayRelayFrame = { type: 'prompter-frame', frame, ts: lastFrameAt };
			lastFrame = JSON.stringify(message);
			for (const client of displayClients) sendTo(client, lastFrame);
		},
		getConnectedDisplays() {
			return displayClients.size;
		},
		close() {
			for (const client of wss.clients) client.terminate();
			displayClients.clear();
			return new Promise<void>((resolve) => {
				wss.close();
				if (!server.listening) {
					resolve();
					return;
				}
				server.close((err) => {
					if (err) warnLog('display-relay', 'close failed', err);
					resolve();
				});
			});
		},
	};
}
