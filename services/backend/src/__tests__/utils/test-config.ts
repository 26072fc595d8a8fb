import { config, type Config } from '../../config';

/** Production config with small chunk sizes so short fixtures span several chunks. */
export const testConfig = (chunkSize: number): Config => ({
  ...config,
  tasks: {
    summarizer: { ...config.tasks.summarizer, chunkSize },
    level_adapter: { ...config.tasks.level_adapter, chunkSize },
    flashcard_gen: { ...config.tasks.flashcard_gen, chunkSize }
  }
});
