import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Logger, OnModuleDestroy } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import { JobStatusView } from '@riskline/shared-models';
import { JobStoreService } from './job-store.service';

/** The part of a socket the subscribe handler uses */
export type SubscribingClient = Pick<Socket, 'id' | 'join'>;

interface JobSubscribePayload {
  jobId: string;
}

export interface JobSubscribeAck {
  subscribed: boolean;
  job?: JobStatusView;
}

export function jobRoom(jobId: string): string {
  return `job:${jobId}`;
}

/**
 * Pushes job status changes to clients subscribed to that job.
 */
@WebSocketGateway({
  cors: {
    origin: true,
    credentials: true,
  },
  namespace: '/jobs',
})
export class JobEventsGateway
  implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect, OnModuleDestroy
{
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(JobEventsGateway.name);

  private unsubscribe?: () => void;

  constructor(private readonly jobStore: JobStoreService) {}

  afterInit(): void {
    this.unsubscribe = this.jobStore.onChange((job) => {
      this.server?.to(jobRoom(job.id)).emit('job:updated', job);
    });
    this.logger.log('Job events gateway listening for status changes');
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  handleConnection(client: Socket): void {
    this.logger.debug(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: Socket): void {
    this.logger.debug(`Client disconnected: ${client.id}`);
  }

  /**
   * Join the room for one job. Acknowledges with its current status so the
   * client does not miss a change made before it subscribed.
   */
  @SubscribeMessage('job:subscribe')
  handleSubscribe(
    @ConnectedSocket() client: SubscribingClient,
    @MessageBody() payload: JobSubscribePayload
  ): JobSubscribeAck {
    const jobId = typeof payload?.jobId === 'string' ? payload.jobId : '';
    const job = jobId ? this.jobStore.view(jobId) : undefined;
    if (!job) {
      return { subscribed: false };
    }

    void client.join(jobRoom(jobId));
    this.logger.debug(`Client ${client.id} subscribed to ${jobId}`);
    return { subscribed: true, job };
  }
}
