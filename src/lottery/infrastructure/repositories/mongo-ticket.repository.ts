import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, mongo } from 'mongoose';
import { Ticket, TicketStatus, WinnerInfo } from '../../domain/ticket.entity';
import {
  ITicketRepository,
  TicketNumberTakenError,
  WeeklyTicketExistsError,
  WinningUpdate,
} from '../../domain/ticket.repository';
import { HydratedTicket, TicketDocument } from '../schemas/ticket.schema';

const MISSING = { $in: [null, ''] };

const INCOMPLETE_INFO: FilterQuery<TicketDocument> = {
  status: TicketStatus.WON,
  $or: [
    { fullName: MISSING },
    { nationalId: MISSING },
    { receivedDate: MISSING },
    { selectedPeriod: MISSING },
    { quantity: null },
  ],
};

function duplicateKeyField(error: unknown): string | null {
  if (!(error instanceof mongo.MongoServerError) || error.code !== 11000) {
    return null;
  }
  const pattern: unknown = error['keyPattern'];
  if (typeof pattern !== 'object' || pattern === null) {
    return null;
  }
  return Object.keys(pattern)[0] ?? null;
}

@Injectable()
export class MongoTicketRepository implements ITicketRepository {
  constructor(
    @InjectModel(TicketDocument.name)
    private readonly ticketModel: Model<TicketDocument>,
  ) {}

  private toDomain(doc: HydratedTicket): Ticket {
    return new Ticket({
      id: doc._id.toString(),
      userId: doc.userId.toString(),
      ticketNumber: doc.ticketNumber,
      weekStart: doc.weekStart,
      status: doc.status,
      fullName: doc.fullName,
      nationalId: doc.nationalId,
      receivedDate: doc.receivedDate,
      selectedPeriod: doc.selectedPeriod,
      quantity: doc.quantity,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    });
  }

  async create(ticket: Ticket): Promise<Ticket> {
    try {
      const created = await this.ticketModel.create({
        userId: ticket.userId,
        ticketNumber: ticket.ticketNumber,
        weekStart: ticket.weekStart,
        status: ticket.status,
        createdAt: ticket.createdAt,
      });
      return this.toDomain(created);
    } catch (error) {
      const field = duplicateKeyField(error);
      if (field === 'ticketNumber') {
        throw new TicketNumberTakenError(ticket.ticketNumber);
      }
      if (field === 'userId') {
        throw new WeeklyTicketExistsError(ticket.userId);
      }
      throw error;
    }
  }

  async existsByTicketNumber(ticketNumber: string): Promise<boolean> {
    return (await this.ticketModel.exists({ ticketNumber }).exec()) !== null;
  }

  async hasTicketSince(userId: string, since: Date): Promise<boolean> {
    const found = await this.ticketModel.exists({ userId, createdAt: { $gte: since } }).exec();
    return found !== null;
  }

  async hasStatusSince(userId: string, status: TicketStatus, since: Date): Promise<boolean> {
    const found = await this.ticketModel
      .exists({ userId, status, createdAt: { $gte: since } })
      .exec();
    return found !== null;
  }

  async findLatestByUserAndStatus(userId: string, status: TicketStatus): Promise<Ticket | null> {
    const doc = await this.ticketModel.findOne({ userId, status }).sort({ createdAt: -1 }).exec();
    return doc ? this.toDomain(doc) : null;
  }

  async findByUser(userId: string): Promise<Ticket[]> {
    const docs = await this.ticketModel.find({ userId }).sort({ createdAt: -1 }).exec();
    return docs.map((doc) => this.toDomain(doc));
  }

  async findByStatus(status: TicketStatus, createdSince?: Date): Promise<Ticket[]> {
    const filter: FilterQuery<TicketDocument> = { status };
    if (createdSince) {
      filter.createdAt = { $gte: createdSince };
    }
    const docs = await this.ticketModel.find(filter).sort({ createdAt: -1 }).exec();
    return docs.map((doc) => this.toDomain(doc));
  }

  async findIncompleteWinners(): Promise<Ticket[]> {
    const docs = await this.ticketModel.find(INCOMPLETE_INFO).sort({ createdAt: 1 }).exec();
    return docs.map((doc) => this.toDomain(doc));
  }

  async findLatestWithIdentity(userId: string, excludeId: string): Promise<Ticket | null> {
    const doc = await this.ticketModel
      .findOne({
        userId,
        _id: { $ne: excludeId },
        status: { $ne: TicketStatus.CANCELLED },
        fullName: { $nin: [null, ''] },
        nationalId: { $nin: [null, ''] },
      })
      .sort({ createdAt: -1 })
      .exec();
    return doc ? this.toDomain(doc) : null;
  }

  async markWon(id: string, update: WinningUpdate): Promise<Ticket | null> {
    const doc = await this.ticketModel
      .findOneAndUpdate(
        { _id: id, status: TicketStatus.PENDING },
        { $set: { ...update, status: TicketStatus.WON } },
        { new: true },
      )
      .exec();
    return doc ? this.toDomain(doc) : null;
  }

  async saveWinnerInfo(id: string, info: WinnerInfo): Promise<Ticket | null> {
    const doc = await this.ticketModel
      .findOneAndUpdate({ _id: id, status: TicketStatus.WON }, { $set: info }, { new: true })
      .exec();
    return doc ? this.toDomain(doc) : null;
  }

  async cancelIfIncomplete(id: string): Promise<boolean> {
    const result = await this.ticketModel
      .updateOne(
        { ...INCOMPLETE_INFO, _id: id },
        { $set: { status: TicketStatus.CANCELLED } },
      )
      .exec();
    return result.modifiedCount === 1;
  }
}
