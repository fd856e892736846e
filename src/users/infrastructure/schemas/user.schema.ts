import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { UserRole } from '../../domain/user.entity';

@Schema({ timestamps: true, collection: 'users' })
export class UserDocument {
  @Prop({ required: true, unique: true, trim: true, maxlength: 15 })
  phoneNumber!: string;

  @Prop({ default: false })
  isPhoneVerified!: boolean;

  @Prop({ type: String, default: null, maxlength: 10 })
  nationalId!: string | null;

  @Prop({ required: true, enum: Object.values(UserRole), default: UserRole.USER })
  role!: UserRole;

  @Prop()
  createdAt!: Date;

  @Prop()
  updatedAt!: Date;
}

export type HydratedUser = HydratedDocument<UserDocument>;

export const UserSchema = SchemaFactory.createForClass(UserDocument);

UserSchema.index({ createdAt: 1 });
