import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { TicketStatus } from '../../domain/ticket.entity';

@Schema({ collection: 'lottery_tickets', timestamps: true })
export class TicketDocument {
  @Prop({ type: Types.ObjectId, ref: 'UserDocument', required: true })
  userId!: Types.ObjectId;

  @Prop({ required: true, unique: true, maxlength: 20 })
  ticketNumber!: string;

  @Prop({ required: true })
  weekStart!: Date;

  @Prop({ required: true, enum: Object.values(TicketStatus), default: TicketStatus.PENDING })
  status!: TicketStatus;

  @Prop({ type: String, default: null, maxlength: 200 })
  fullName!: string | null;

  @Prop({ type: String, default: null, maxlength: 10 })
  nationalId!: string | null;

  @Prop({ type: String, default: null, maxlength: 100 })
  receivedDate!: string | null;

  @Prop({ type: String, default: null, maxlength: 100 })
  selectedPeriod!: string | null;

  @Prop({ type: Number, default: null, min: 1, max: 3 })
  quantity!: number | null;

  @Prop()
  createdAt!: Date;

  @Prop()
  updatedAt!: Date;
}

export type HydratedTicket = HydratedDocument<TicketDocument>;

export const TicketSchema = SchemaFactory.createForClass(TicketDocument);

// One ticket per user per registration week, enforced by the database.
TicketSchema.index({ userId: 1, weekStart: 1 }, { unique: true });
TicketSchema.index({ userId: 1, createdAt: -1 });
TicketSchema.index({ status: 1, createdAt: -1 });
