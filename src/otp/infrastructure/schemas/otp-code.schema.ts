import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { OtpPurpose } from '../../domain/otp-code.entity';

@Schema({ collection: 'otp_codes' })
export class OtpCodeDocument {
  @Prop({ required: true, trim: true, maxlength: 15 })
  phoneNumber!: string;

  @Prop({ required: true })
  codeHash!: string;

  @Prop({ required: true, enum: Object.values(OtpPurpose) })
  purpose!: OtpPurpose;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  expiresAt!: Date;

  @Prop({ default: false })
  used!: boolean;
}

export type HydratedOtpCode = HydratedDocument<OtpCodeDocument>;

export const OtpCodeSchema = SchemaFactory.createForClass(OtpCodeDocument);

OtpCodeSchema.index({ phoneNumber: 1, createdAt: -1 });
OtpCodeSchema.index({ phoneNumber: 1, purpose: 1, used: 1, createdAt: -1 });
OtpCodeSchema.index({ expiresAt: 1 });
