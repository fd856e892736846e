import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { IUserRepository, UserUpdate } from '../../domain/user.repository';
import { User } from '../../domain/user.entity';
import { HydratedUser, UserDocument } from '../schemas/user.schema';

@Injectable()
export class MongoUserRepository implements IUserRepository {
  constructor(
    @InjectModel(UserDocument.name)
    private readonly userModel: Model<UserDocument>,
  ) {}

  private toDomain(doc: HydratedUser): User {
    return new User({
      id: doc._id.toString(),
      phoneNumber: doc.phoneNumber,
      isPhoneVerified: doc.isPhoneVerified,
      nationalId: doc.nationalId,
      role: doc.role,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    });
  }

  async findById(id: string): Promise<User | null> {
    const doc = await this.userModel.findById(id).exec();
    return doc ? this.toDomain(doc) : null;
  }

  async findByIds(ids: string[]): Promise<User[]> {
    const docs = await this.userModel.find({ _id: { $in: ids } }).exec();
    return docs.map((doc) => this.toDomain(doc));
  }

  async findByPhoneNumber(phoneNumber: string): Promise<User | null> {
    const doc = await this.userModel.findOne({ phoneNumber }).exec();
    return doc ? this.toDomain(doc) : null;
  }

  async create(user: User): Promise<User> {
    const created = new this.userModel({
      phoneNumber: user.phoneNumber,
      isPhoneVerified: user.isPhoneVerified,
      nationalId: user.nationalId,
      role: user.role,
    });
    const saved = await created.save();
    return this.toDomain(saved);
  }

  async update(id: string, data: UserUpdate): Promise<User | null> {
    const updated = await this.userModel
      .findByIdAndUpdate(id, { $set: data }, { new: true })
      .exec();
    return updated ? this.toDomain(updated) : null;
  }
}
