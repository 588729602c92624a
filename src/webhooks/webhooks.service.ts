import {
  BadGatewayException,
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import { INTAKE_CONFIG } from '../config/intake-config.provider';
import { IntakeConfig } from '../config/interfaces/intake-config.interface';
import { VoiceSynthesisRequest } from '../voice/interfaces/voice-synthesis.interface';
import { VoiceSynthesisService } from '../voice/voice-synthesis.service';
import { WebhookEventDto } from './dto/webhook-event.dto';
import {
  ForwardingOutcome,
  WebhookAcknowledgement,
} from './interfaces/webhook-acknowledgement.interface';
import { WebhookEvent } from './interfaces/webhook-event.interface';

export type IncomingEvent = Omit<WebhookEvent, 'id' | 'receivedAt'>;

@Injectable()
export class WebhooksService implements OnApplicationShutdown {
  private readonly logger = new Logger(WebhooksService.name);
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    @Inject(INTAKE_CONFIG) private readonly config: IntakeConfig,
    private readonly voiceService: VoiceSynthesisService,
  ) {}

  async receive(dto: WebhookEventDto): Promise<WebhookAcknowledgement> {
    return this.ingest({
      type: dto.event,
      data: dto.data ?? {},
      text: dto.text,
      voiceId: dto.voiceId,
    });
  }

  async ingest(incoming: IncomingEvent): Promise<WebhookAcknowledgement> {
    const event: WebhookEvent = {
      ...incoming,
      id: randomUUID(),
      receivedAt: new Date().toISOString(),
    };

    this.logger.log(`Received webhook ${event.type} (${event.id})`);

    const forwarding = await this.forward(event);
    return { status: 'received', id: event.id, forwarding };
  }

  /** Resolves once every best-effort call started so far has settled. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} voice synthesis call(s) to settle`);
    }
    await this.drain();
  }

  private async forward(event: WebhookEvent): Promise<ForwardingOutcome> {
    const text = event.text?.trim();
    if (!text || !this.voiceService.isEnabled()) {
      return 'skipped';
    }

    const request: VoiceSynthesisRequest = { eventId: event.id, text, voiceId: event.voiceId };

    if (this.config.voice.forwardMode === 'required') {
      const result = await this.voiceService.synthesize(request);
      if (!result.success) {
        throw new BadGatewayException(result.error ?? 'Voice synthesis failed');
      }
      return 'delivered';
    }

    this.track(this.voiceService.synthesize(request).then(() => undefined));
    return 'dispatched';
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Voice synthesis task rejected: ${message}`);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
