// Console filtering: library warnings are silenced unless JEST_ALLOW_ALL_LOGS=1.
// Tests asserting on warnings re-spy console.warn; Jest hands back the active spy.
const ALLOW_ALL = process.env.JEST_ALLOW_ALL_LOGS === '1';

if (!ALLOW_ALL) {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
}
