import type { MergedOutput } from "../types";
import type { HarvestDocument } from "./reader";

export interface CombineResult {
  output: MergedOutput;
  mixedTypes: boolean;
}

/**
 * Concatenates features and logs in input order. Metadata documents are kept once each,
 * compared by their serialized form, so harvests of the same layer stay joinable on ppid.
 */
export function combineHarvestDocuments(documents: HarvestDocument[]): CombineResult {
  const output: MergedOutput = {
    type: "FeatureCollection",
    features: [],
    request_logging: [],
    request_metadata: [],
  };
  const seenMetadata = new Set<string>();
  const types = new Set<string>();

  for (const document of documents) {
    types.add(document.type);
    output.features.push(...document.features);
    output.request_logging.push(...document.request_logging);
    for (const metadata of document.request_metadata) {
      const key = JSON.stringify(metadata);
      if (!seenMetadata.has(key)) {
        seenMetadata.add(key);
        output.request_metadata.push(metadata);
      }
    }
  }

  return { output, mixedTypes: types.size > 1 };
}
