import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsObject, IsOptional, IsString, MaxLength } from 'class-validator';

export class WebhookEventDto {
  @ApiProperty({ example: 'call.completed', maxLength: 100 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  event!: string;

  @ApiPropertyOptional({ type: Object, example: { callId: 'call_123' } })
  @IsOptional()
  @IsObject()
  data?: Record<string, unknown>;

  @ApiPropertyOptional({
    example: 'Your appointment is confirmed for tomorrow.',
    maxLength: 5000,
    description: 'Text forwarded to the voice synthesis API',
  })
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  text?: string;

  @ApiPropertyOptional({ example: 'voice_123', description: 'Overrides the default voice' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  voiceId?: string;
}
