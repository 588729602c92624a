import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

/** Form fields posted by SMS providers for an inbound message. */
export class SmsWebhookDto {
  @ApiProperty({ example: '+15550000001' })
  @IsString()
  @IsNotEmpty()
  From!: string;

  @ApiPropertyOptional({ example: '+15550000002' })
  @IsOptional()
  @IsString()
  To?: string;

  @ApiProperty({ example: 'Please call me back', maxLength: 1600 })
  @IsString()
  @MaxLength(1600)
  Body!: string;

  @ApiPropertyOptional({ example: 'SM0000000000000000000000000000000' })
  @IsOptional()
  @IsString()
  MessageSid?: string;
}
