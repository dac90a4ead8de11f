#!/usr/bin/env node
import { main } from "./cli";
import { FdSink, FdSource } from "./streams";

const io = {
  stdin: new FdSource(0),
  stdout: new FdSink(1, { lineBuffered: process.stdout.isTTY === true }),
  stderr: new FdSink(2, { lineBuffered: true }),
  env: process.env,
};

main(process.argv.slice(2), io)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  });
