import { Inject, Injectable } from '@nestjs/common';
import { Observation } from '../observation';
import { RANDOM_SOURCE, RandomSource } from '../random-source';
import { generateObservations } from '../sample-generator';

@Injectable()
export class SampleGeneratorService {
  constructor(
    @Inject(RANDOM_SOURCE)
    private readonly random: RandomSource,
  ) {}

  /**
   * Generate a batch of observations. The returned array is frozen: it is
   * handed to the database gateway as-is.
   */
  generate(count: number): readonly Observation[] {
    return Object.freeze(generateObservations(count, this.random));
  }
}
