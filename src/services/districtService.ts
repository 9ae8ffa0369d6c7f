import { v4 as uuidv4 } from 'uuid';
import { ConflictError, DuplicateKeyError, NotFoundError } from '../errors';
import type { CreateDistrictInput, District, DistrictPatch } from '../types';
import { applyPatch } from '../utils/patch';
import type { ServiceContext } from './context';

export class DistrictService {
  constructor(private readonly ctx: ServiceContext) {}

  private get districts() {
    return this.ctx.store.collection('districts');
  }

  list(): Promise<District[]> {
    return this.districts.load();
  }

  async create(input: CreateDistrictInput): Promise<District> {
    const districts = await this.districts.load();
    if (districts.some((d) => d.code === input.code)) {
      throw new DuplicateKeyError('District code already exists');
    }

    const district: District = {
      id: uuidv4(),
      name: input.name,
      code: input.code,
      description: input.description ?? '',
      createdAt: this.ctx.now().toISOString(),
    };
    districts.push(district);
    await this.districts.save(districts);
    return district;
  }

  async update(id: string, patch: DistrictPatch): Promise<District> {
    const districts = await this.districts.load();
    const index = districts.findIndex((d) => d.id === id);
    if (index === -1) throw new NotFoundError('District not found');

    districts[index] = applyPatch(districts[index], patch);
    await this.districts.save(districts);
    return districts[index];
  }

  /** Removing an id that is already gone succeeds. */
  async delete(id: string): Promise<void> {
    const departments = await this.ctx.store.collection('departments').load();
    if (departments.some((dept) => dept.districtId === id)) {
      throw new ConflictError('District still has departments');
    }

    const districts = await this.districts.load();
    await this.districts.save(districts.filter((d) => d.id !== id));
  }
}
