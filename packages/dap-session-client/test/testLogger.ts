import * as sinon from 'sinon';
import { LoggerInterface } from '../src/logging';

export const createMockLogger = (): LoggerInterface => {
  const logger: LoggerInterface = {
    trace: sinon.stub<unknown[], void>(),
    debug: sinon.stub<unknown[], void>(),
    info: sinon.stub<unknown[], void>(),
    warn: sinon.stub<unknown[], void>(),
    error: sinon.stub<unknown[], void>(),
    child: () => logger,
  };
  return logger;
};

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
