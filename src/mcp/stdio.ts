#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from '../config.js';
import { createScanService } from '../pipeline/scan-service.js';
import { createMarketDataProvider } from '../providers/index.js';
import { loadAssetGroups } from '../universe/asset-groups.js';
import { createMcpServer } from './server.js';

// stdout carries the protocol; route progress logs to stderr.
console.log = (...args: unknown[]) => console.error(...args);

const provider = createMarketDataProvider(config);
const groups = loadAssetGroups(config.ASSET_GROUPS_FILE);
const server = createMcpServer(createScanService(config, provider, groups));

const transport = new StdioServerTransport();
await server.connect(transport);
