import type WebSocket from 'ws';

/**
 * The only way the server reaches a client. `send` rejects when the
 * transport refuses the message; callers treat that as a disconnect.
 */
export interface ClientChannel {
	readonly open: boolean;
	send(text: string): Promise<void>;
	close(code?: number, reason?: string): void;
}

export class WebSocketChannel implements ClientChannel {
	constructor(private readonly socket: WebSocket) {}

	get open(): boolean {
		return this.socket.readyState === this.socket.OPEN;
	}

	send(text: string): Promise<void> {
		return new Promise((resolve, reject) => {
			if (!this.open) {
				reject(new Error('socket is not open'));
				return;
			}
			this.socket.send(text, (err) => (err ? reject(err) : resolve()));
		});
	}

	close(code = 1000, reason = ''): void {
		if (this.socket.readyState === this.socket.CLOSED) return;
		this.socket.close(code, reason);
	}
}
