import { DEFAULT_ROOM_ID, type Role } from '@rtc-detect/shared';
import type { ClientChannel } from '../signaling/channel';

type ClientEntry = {
	clientId: string;
	roomId: string;
	role: Role;
	channel: ClientChannel;
};

type Room = {
	// Map keeps insertion order, which is the join order used for host promotion
	members: Map<string, ClientEntry>;
	hostId: string | null;
};

/**
 * Authoritative in-memory state for rooms, members and roles.
 *
 * Every operation is synchronous, so it runs to completion on the event loop
 * before any other connection's callback can observe the room. A host
 * promotion therefore always lands together with the removal that caused it.
 *
 * Rooms are created on first join and never evicted; an emptied room stays
 * addressable with no host.
 */
export class RoomRegistry {
	private readonly rooms = new Map<string, Room>();
	private readonly clients = new Map<string, ClientEntry>();

	join(clientId: string, roomId: string | undefined, channel: ClientChannel): Role {
		// one live connection per id: a reconnect replaces the previous entry
		if (this.clients.has(clientId)) {
			this.remove(clientId);
		}

		const targetRoomId = roomId || DEFAULT_ROOM_ID;
		let room = this.rooms.get(targetRoomId);
		if (!room) {
			room = { members: new Map(), hostId: null };
			this.rooms.set(targetRoomId, room);
		}

		const role: Role = room.hostId === null ? 'host' : 'phone';
		const entry: ClientEntry = {
			clientId,
			roomId: targetRoomId,
			role,
			channel,
		};
		room.members.set(clientId, entry);
		this.clients.set(clientId, entry);
		if (role === 'host') room.hostId = clientId;
		return role;
	}

	/**
	 * Removes the client from its room. With `channel` given, only the
	 * connection that owns that channel is removed, so a superseded socket
	 * closing late cannot evict the connection that replaced it.
	 */
	leave(clientId: string, channel?: ClientChannel): void {
		const entry = this.clients.get(clientId);
		if (!entry) return;
		if (channel && entry.channel !== channel) return;
		this.remove(clientId);
	}

	members(roomId: string): string[] {
		const room = this.rooms.get(roomId);
		return room ? [...room.members.keys()] : [];
	}

	route(clientId: string): ClientChannel | undefined {
		return this.clients.get(clientId)?.channel;
	}

	roleOf(clientId: string): Role {
		return this.clients.get(clientId)?.role ?? 'unassigned';
	}

	roomOf(clientId: string): string | undefined {
		return this.clients.get(clientId)?.roomId;
	}

	hostOf(roomId: string): string | null {
		return this.rooms.get(roomId)?.hostId ?? null;
	}

	get roomCount(): number {
		return this.rooms.size;
	}

	get clientCount(): number {
		return this.clients.size;
	}

	private remove(clientId: string): void {
		const entry = this.clients.get(clientId);
		if (!entry) return;
		this.clients.delete(clientId);

		const room = this.rooms.get(entry.roomId);
		if (!room) return;
		room.members.delete(clientId);
		if (room.hostId !== clientId) return;

		room.hostId = null;
		const [next] = room.members.values();
		if (next) {
			next.role = 'host';
			room.hostId = next.clientId;
		}
	}
}
