jest.mock('@sentry/node', () => ({
  __esModule: true,
  init: jest.fn(),
  setUser: jest.fn(),
  captureException: jest.fn(),
  captureMessage: jest.fn(),
  withScope: (fn: (scope: { setExtras: () => void }) => void) => fn({ setExtras: jest.fn() }),
}));

for (const key of Object.keys(process.env)) {
  if (key.startsWith('NAV_') || key.startsWith('ROUTER_') || key.startsWith('SENTRY_') || key === 'LOG_FILE') {
    delete process.env[key];
  }
}
