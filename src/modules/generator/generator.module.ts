import { Module } from '@nestjs/common';
import { JOB_CONFIG, JobConfig } from '../../config/job.config';
import { MathRandomSource, RANDOM_SOURCE, RandomSource, SeededRandomSource } from './random-source';
import { SampleGeneratorService } from './services/sample-generator.service';

@Module({
  providers: [
    {
      provide: RANDOM_SOURCE,
      useFactory: (config: JobConfig): RandomSource =>
        config.generatorSeed === undefined
          ? new MathRandomSource()
          : new SeededRandomSource(config.generatorSeed),
      inject: [JOB_CONFIG],
    },
    SampleGeneratorService,
  ],
  exports: [SampleGeneratorService],
})
export class GeneratorModule {}
