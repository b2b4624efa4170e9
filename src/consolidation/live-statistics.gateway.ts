import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Logger } from '@nestjs/common';
import { Statistics } from '../statistics/statistics';

export const STATISTICS_UPDATE_EVENT = 'statistics-update';

@WebSocketGateway({
  cors: {
    origin: '*',
  },
  namespace: '/statistics',
})
export class LiveStatisticsGateway implements OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(LiveStatisticsGateway.name);

  handleConnection(client: Socket) {
    this.logger.log(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  /** Pushes the current live statistics to every connected client. */
  broadcast(stats: Statistics) {
    this.server.emit(STATISTICS_UPDATE_EVENT, stats);
  }
}
