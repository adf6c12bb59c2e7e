export default {
  format: 'json',
  timeout: 30000,
  verbose: false,
  boolAsInt: false,
  headers: {},
};
