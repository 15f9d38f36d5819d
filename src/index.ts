/**
 * Purpose: Expose the alignment-plot validation, reshaping, and chart-assembly APIs.
 * Intent: Keep the public module thin while internals remain modular.
 */

export { plotTechmix, qplotTechmix, techmixCategoryLabels, technologyFills } from "./chart_techmix.js";
export type { TechmixChartOptions, TechmixChartResult, TechnologyFill } from "./chart_techmix.js";
export {
  SUPPORTING_LINE_STYLES,
  plotTrajectory,
  qplotTrajectory,
  scenarioSpecsFromData,
  supportingLineStyle,
} from "./chart_trajectory.js";
export type { QuickTrajectoryOptions, TrajectoryChartOptions, TrajectoryChartResult } from "./chart_trajectory.js";
export { orderLines, plotEmissionIntensity, qplotEmissionIntensity } from "./chart_emission_intensity.js";
export type { EmissionIntensityChartOptions, EmissionIntensityChartResult } from "./chart_emission_intensity.js";
export { MAX_DELTA_DISTANCE, computeAreaBorders, layoutBands } from "./chart_bands.js";
export type { AreaBorders, BandInputRow, BandLayout, BandRow } from "./chart_bands.js";
export { ChartDataError, isChartDataError } from "./chart_errors.js";
export type { ChartDataErrorDetail, ChartDataErrorKind } from "./chart_errors.js";
export {
  MAX_EMISSION_INTENSITY_LINES,
  emissionIntensityContract,
  techmixContract,
  trajectoryContract,
  validateEmissionIntensityData,
  validateTechmixData,
  validateTrajectoryData,
} from "./data_contract.js";
export type { TableContract } from "./data_contract.js";
export {
  prepareEmissionIntensityData,
  prepareTechmixData,
  prepareTrajectoryData,
  recodeSector,
  span5yr,
} from "./data_reshape.js";
export type {
  EmissionIntensityPlotRow,
  LabelConverter,
  PrepOptions,
  Prepared,
  TechmixPlotRow,
  TechmixPrepOptions,
  TrajectoryPlotRow,
} from "./data_reshape.js";
export { prepareForTrajectoryChart } from "./data_trajectory.js";
export type { TrajectoryFilters, TrajectoryValueName } from "./data_trajectory.js";
export { classifyMetric, extractScenarios, trajectoryMetricType } from "./metric_classify.js";
export type { MetricClass } from "./metric_classify.js";
export { spellOutTechnology, toTitle } from "./contract_common.js";
export { WORSE_BAND, createChartContext, defaultChartContext, technologyDirection } from "./reference_data.js";
export type * from "./chart_types.js";
export type * from "./types.js";
