#!/usr/bin/env node
import 'source-map-support/register.js';
import * as cdk from 'aws-cdk-lib';
import { readFileSync } from 'fs';
import { TransferGatewayStack } from '../lib/transfer-gateway-stack.js';

const app = new cdk.App();

// A different configuration file can be passed with -c transferConfigPath=...
const configPath: unknown = app.node.tryGetContext('transferConfigPath');
const configSource =
  typeof configPath === 'string' ? configPath : new URL('../../backend/config/transfer-config.json', import.meta.url);

// Compacted to one line; invalid JSON fails the synth
const transferConfig = JSON.stringify(JSON.parse(readFileSync(configSource, 'utf8')));

new TransferGatewayStack(app, 'TransferGatewayStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
  },
  description: 'Infrastructure for the data transfer gateway',
  transferConfig,
});

app.synth();
