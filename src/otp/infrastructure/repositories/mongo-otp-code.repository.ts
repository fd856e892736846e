import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { OtpCode, OtpPurpose } from '../../domain/otp-code.entity';
import { IOtpCodeRepository } from '../../domain/otp-code.repository';
import { HydratedOtpCode, OtpCodeDocument } from '../schemas/otp-code.schema';

@Injectable()
export class MongoOtpCodeRepository implements IOtpCodeRepository {
  constructor(
    @InjectModel(OtpCodeDocument.name)
    private readonly otpModel: Model<OtpCodeDocument>,
  ) {}

  private toDomain(doc: HydratedOtpCode): OtpCode {
    return new OtpCode({
      id: doc._id.toString(),
      phoneNumber: doc.phoneNumber,
      codeHash: doc.codeHash,
      purpose: doc.purpose,
      createdAt: doc.createdAt,
      expiresAt: doc.expiresAt,
      used: doc.used,
    });
  }

  async create(code: OtpCode): Promise<OtpCode> {
    const created = await this.otpModel.create({
      phoneNumber: code.phoneNumber,
      codeHash: code.codeHash,
      purpose: code.purpose,
      createdAt: code.createdAt,
      expiresAt: code.expiresAt,
      used: code.used,
    });
    return this.toDomain(created);
  }

  async countCreatedSince(phoneNumber: string, since: Date): Promise<number> {
    return this.otpModel.countDocuments({ phoneNumber, createdAt: { $gte: since } }).exec();
  }

  async findLatestUnused(phoneNumber: string, purpose: OtpPurpose): Promise<OtpCode | null> {
    const doc = await this.otpModel
      .findOne({ phoneNumber, purpose, used: false })
      .sort({ createdAt: -1 })
      .exec();
    return doc ? this.toDomain(doc) : null;
  }

  async markUsed(id: string): Promise<boolean> {
    const result = await this.otpModel
      .updateOne({ _id: id, used: false }, { $set: { used: true } })
      .exec();
    return result.modifiedCount === 1;
  }

  async deleteExpired(now: Date): Promise<number> {
    const result = await this.otpModel.deleteMany({ expiresAt: { $lt: now } }).exec();
    return result.deletedCount;
  }
}
