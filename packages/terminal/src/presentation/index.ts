export { chartFromTable, renderLineChartSvg, writeChart } from './chart.js';
export type { ChartSeries, LineChart } from './chart.js';
export { exportTable, timestamp, toCsv, toJson } from './export.js';
export { formatCell, formatTable } from './format.js';
export { ConsolePresenter } from './presenter.js';
export type { ConsolePresenterOptions, Presenter } from './presenter.js';
