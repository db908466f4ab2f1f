import { z } from 'zod';
import { CatalogValidationError } from './errors';

export const DATASET_SOURCES = ['DANDI', 'Kaggle', 'OpenNeuro', 'PhysioNet'] as const;

export const DatasetSourceSchema = z.enum(DATASET_SOURCES);

export type DatasetSource = z.infer<typeof DatasetSourceSchema>;

export type SourceDefinition = {
  key: DatasetSource;
  label: string;
  description: string;
  homepage: string;
};

export const SOURCE_DEFINITIONS: SourceDefinition[] = [
  {
    key: 'DANDI',
    label: 'DANDI Archive',
    description: 'Cellular neurophysiology datasets in NWB, versioned dandisets.',
    homepage: 'https://dandiarchive.org',
  },
  {
    key: 'Kaggle',
    label: 'Kaggle',
    description: 'Community-published datasets tagged for neuroscience.',
    homepage: 'https://www.kaggle.com/datasets',
  },
  {
    key: 'OpenNeuro',
    label: 'OpenNeuro',
    description: 'BIDS-formatted MRI, MEG, EEG and iEEG datasets.',
    homepage: 'https://openneuro.org',
  },
  {
    key: 'PhysioNet',
    label: 'PhysioNet',
    description: 'Physiologic signal databases with clinical annotations.',
    homepage: 'https://physionet.org',
  },
];

export const isDatasetSource = (value: unknown): value is DatasetSource => {
  return DatasetSourceSchema.safeParse(value).success;
};

export const findSourceDefinition = (key: string): SourceDefinition => {
  const def = SOURCE_DEFINITIONS.find((entry) => entry.key === key);
  if (!def) {
    throw new CatalogValidationError('source', `Invalid source: ${key}`);
  }
  return def;
};
