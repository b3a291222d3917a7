export {
  ClassifyMetabolitesTool,
  ClassifyMetabolitesInputSchema,
  overallProgress,
  type ClassifyMetabolitesOutput,
  type ProgressEvent,
  type ProgressListener,
} from './classify-metabolites.js';
export { RenderTableTool, RenderTableInputSchema, selectDisplayColumns } from './render-table.js';
