export * from './list-runs-query.dto';
export * from './run-report.dto';
