const logger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    level: 'info',
};

export const enableFileLogging = jest.fn();
export const setLogLevel = jest.fn();

export default logger;
