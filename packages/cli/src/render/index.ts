export { renderTable } from './table.js';
export { renderBarChart } from './chart.js';
export { renderSummary, renderStats } from './summary.js';
