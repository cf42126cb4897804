export { JsonHandoffBackend, type JsonHandoffOptions, type RenderResult, type VisualizerBackend } from './backend.js';
export {
  DisplayController,
  type DisplayControllerOptions,
  type DisplayFailure,
  type DisplayReport,
  type DisplayRequest,
  type DisplaySettings,
  type RenderedSection,
} from './controller.js';
export {
  resolveOverrides,
  selectVisualizer,
  selectVisualizers,
  type AssignmentSource,
  type InterfaceDefaults,
  type SelectionTarget,
  type VisualizerAssignment,
  type VisualizerOverrides,
} from './selector.js';
export {
  DEFAULT_VISUALIZERS,
  VISUALIZERS,
  VISUALIZER_CATALOGUE,
  datatypeOf,
  isCompatible,
  isVisualizer,
  supportsMerged,
  visualizersFor,
  type Visualizer,
  type VisualizerInfo,
} from './visualizers.js';
