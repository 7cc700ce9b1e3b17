export {
  getMetrics,
  setMetrics,
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
} from "./metrics.js";
export type { AdmissionMetrics, Counter, Histogram, HistogramSummary } from "./metrics.js";
