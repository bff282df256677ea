import type { ServiceMetadataDocument } from "../types";

export interface LayerInfo {
  name?: string;
  id?: number;
  maxRecordCount?: number;
  supportedQueryFormats: string[];
}

export function readLayerInfo(metadata: ServiceMetadataDocument): LayerInfo {
  const { name, id, maxRecordCount, supportedQueryFormats } = metadata;
  return {
    name: typeof name === "string" ? name : undefined,
    id: typeof id === "number" ? id : undefined,
    maxRecordCount: typeof maxRecordCount === "number" && maxRecordCount > 0 ? maxRecordCount : undefined,
    supportedQueryFormats:
      typeof supportedQueryFormats === "string"
        ? supportedQueryFormats
            .split(",")
            .map((format) => format.trim().toLowerCase())
            .filter((format) => format.length > 0)
        : [],
  };
}

export function layerLabel(layer: LayerInfo): string {
  if (layer.name) {
    return layer.name;
  }
  return layer.id !== undefined ? `layer-${layer.id}` : "layer";
}
