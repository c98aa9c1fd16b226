process.env.NODE_ENV = "test";
process.env.APPINSIGHTS_CONNECTION_STRING ||= "";

process.on("unhandledRejection", (reason) => {
  throw reason;
});
