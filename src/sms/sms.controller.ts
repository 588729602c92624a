import { Body, Controller, Header, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { ApiConsumes, ApiOperation, ApiProduces, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { WebhookSecretGuard } from '../auth/guards/webhook-secret.guard';
import { WebhooksService } from '../webhooks/webhooks.service';
import { SmsWebhookDto } from './dto/sms-webhook.dto';

@ApiTags('sms')
@ApiSecurity('webhook-secret')
@Controller('sms')
@UseGuards(WebhookSecretGuard)
export class SmsController {
  constructor(private readonly webhooksService: WebhooksService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/plain')
  @ApiConsumes('application/x-www-form-urlencoded')
  @ApiProduces('text/plain')
  @ApiOperation({ summary: 'Receive an inbound SMS' })
  async receive(@Body() dto: SmsWebhookDto): Promise<string> {
    await this.webhooksService.ingest({
      type: 'sms.received',
      data: {
        from: dto.From,
        to: dto.To,
        messageSid: dto.MessageSid,
      },
      text: dto.Body,
    });
    return 'OK';
  }
}
