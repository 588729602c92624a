import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { WebhookSecretGuard } from '../auth/guards/webhook-secret.guard';
import { WebhookEventDto } from './dto/webhook-event.dto';
import { WebhookAcknowledgement } from './interfaces/webhook-acknowledgement.interface';
import { WebhooksService } from './webhooks.service';

@ApiTags('webhooks')
@ApiSecurity('webhook-secret')
@Controller('webhook')
@UseGuards(WebhookSecretGuard)
export class WebhooksController {
  constructor(private readonly webhooksService: WebhooksService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Receive a webhook event' })
  async receive(@Body() dto: WebhookEventDto): Promise<WebhookAcknowledgement> {
    return this.webhooksService.receive(dto);
  }
}
