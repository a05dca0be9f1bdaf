import { Types, type FilterQuery, type Model, type UpdateQuery } from 'mongoose';
import { toObjectId, toPublicId } from '@/lib/ids';
import type { Resource, ResourceInput } from '@/lib/types';

/** Equality filter over public fields. `null` also matches a missing field. */
export type Filter<T extends Resource> = Partial<ResourceInput<T>>;

export interface Repository<T extends Resource> {
  insert(input: ResourceInput<T>): Promise<string>;
  findById(id: string): Promise<T | null>;
  findMany(filter?: Filter<T>): Promise<T[]>;
  findOneAndUpdate(id: string, changes: Partial<ResourceInput<T>>): Promise<T | null>;
  deleteOne(id: string): Promise<T | null>;
  updateMany(filter: Filter<T>, changes: Partial<ResourceInput<T>>): Promise<number>;
}

export type StoredDocument<TRecord> = TRecord & { _id: Types.ObjectId };

/** Two-way mapping between a public resource and the record mongoose persists. */
export interface DocumentMapper<T extends Resource, TRecord> {
  toPublic(document: StoredDocument<TRecord>): T;
  toRecord(input: ResourceInput<T>): TRecord;
  toFilter(filter: Filter<T>): FilterQuery<TRecord>;
  toUpdate(changes: Partial<ResourceInput<T>>): UpdateQuery<TRecord>;
}

export class MongooseRepository<T extends Resource, TRecord> implements Repository<T> {
  constructor(
    private readonly resource: string,
    private readonly model: Model<TRecord>,
    private readonly mapper: DocumentMapper<T, TRecord>
  ) {}

  async insert(input: ResourceInput<T>) {
    const _id = new Types.ObjectId();
    await this.model.create({ ...this.mapper.toRecord(input), _id });
    return toPublicId(_id);
  }

  async findById(id: string) {
    const document = await this.model.findById(toObjectId(id, this.resource)).lean<StoredDocument<TRecord>>();
    return document ? this.mapper.toPublic(document) : null;
  }

  async findMany(filter: Filter<T> = {}) {
    const documents = await this.model
      .find(this.mapper.toFilter(filter))
      .sort({ _id: 1 })
      .lean<StoredDocument<TRecord>[]>();
    return documents.map((document) => this.mapper.toPublic(document));
  }

  async findOneAndUpdate(id: string, changes: Partial<ResourceInput<T>>) {
    const document = await this.model
      .findByIdAndUpdate(toObjectId(id, this.resource), this.mapper.toUpdate(changes), {
        new: true,
        runValidators: true
      })
      .lean<StoredDocument<TRecord>>();
    return document ? this.mapper.toPublic(document) : null;
  }

  async deleteOne(id: string) {
    const document = await this.model.findByIdAndDelete(toObjectId(id, this.resource)).lean<StoredDocument<TRecord>>();
    return document ? this.mapper.toPublic(document) : null;
  }

  async updateMany(filter: Filter<T>, changes: Partial<ResourceInput<T>>) {
    const result = await this.model.updateMany(this.mapper.toFilter(filter), this.mapper.toUpdate(changes));
    return result.modifiedCount;
  }
}
