export type { FioLogDirection, FioLogSample } from "./fio-log";
export { findLatencySpikes, parseFioLog } from "./fio-log";
export {
	buildTimelineChart,
	renderChart,
	renderCharts,
	renderSvg,
} from "./render";
export type { ChartDefinition } from "./specs";
export {
	buildIopsTimelineSpec,
	buildLatencyChartSpec,
	buildThroughputChartSpec,
} from "./specs";
