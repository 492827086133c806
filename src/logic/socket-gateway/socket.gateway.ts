import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { Server, Socket } from 'socket.io';

export type SocketEvent = 'log.entry' | 'log.cleared' | 'conversation.turn' | 'conversation.cleared';

@WebSocketGateway({
  cors: {
    origin: [
      'http://localhost:3000',
      'http://localhost:5173',
      'http://localhost:8787',
    ],
    credentials: false,
  },
})
export class SocketGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(SocketGateway.name);
  private readonly clients = new Set<string>();

  @WebSocketServer()
  public server!: Server;

  handleConnection(client: Socket) {
    this.clients.add(client.id);
    client.emit('connection:ack', { socketId: client.id });
    this.logger.debug(`UI connected (${this.clients.size} open)`);
  }

  handleDisconnect(client: Socket) {
    this.clients.delete(client.id);
  }

  broadcast(event: SocketEvent, data: unknown) {
    // Not yet bound while the app is bootstrapping.
    if (!this.server) {
      return;
    }
    this.server.emit(event, data);
  }
}
