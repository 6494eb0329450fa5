export { FakeConnection } from './fake-connection.js';
