export { MemoryObservationIndex } from "./memoryObservationIndex.js";
export { PolicyMerger, type PolicyMergerDeps } from "./policyMerger.js";
export { DenseRanker, compareByFrequency } from "./denseRanker.js";
export { ArrayHeap, MinHeapTopKSelector } from "./minHeapTopK.js";
