import { setLogLevel } from '@sensor-link/client';

// Keep test output readable; tests that care about logging raise the level themselves.
setLogLevel('silent');
