import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  RPC_URLS: z.string().default('https://bsc-dataseed.binance.org,https://bsc-dataseed1.defibit.io'),
  RPC_TIMEOUT_MS: z.string().default('10000'),
  RPC_MAX_ATTEMPTS: z.string().default('3'),
  RPC_BACKOFF_MS: z.string().default('250'),

  // PancakeSwap V2 on BSC mainnet
  PANCAKESWAP_ROUTER_V2: z.string().default('0x10ED43C718714eb63d5aA57B78B54704E256024E'),
  PANCAKESWAP_FACTORY_V2: z.string().default('0xcA143Ce32Fe78f1f7019d7d551a6402fC5350c73'),
  WBNB_ADDRESS: z.string().default('0xbb4CdB9CBd36B01bD1cBaeBF2De08d9173bc095c'),

  // Simulation
  SIMULATION_SIZES_BNB: z.string().default('0.001,0.01,0.1'),
  TAX_BASELINE: z.enum(['reserves', 'quote']).default('reserves'),
  AMM_FEE_BPS: z.string().default('30'),
  ANALYSIS_DEADLINE_MS: z.string().default('30000'),

  // Explorer
  BSCSCAN_API_URL: z.string().default('https://api.bscscan.com/api'),
  BSCSCAN_API_KEY: z.string().optional(),

  // Metadata cache
  METADATA_CACHE_TTL_SEC: z.string().default('300'),
  METADATA_CACHE_MAX: z.string().default('1000'),

  // Storage
  SQLITE_PATH: z.string().default('token-risk.db'),

  // Logging
  LOG_LEVEL: z.string().default('info')
});

export const rawEnv = envSchema.parse(process.env);

export const env = {
  RPC_URLS: rawEnv.RPC_URLS.split(',').map((s) => s.trim()).filter(Boolean),
  RPC_TIMEOUT_MS: Number(rawEnv.RPC_TIMEOUT_MS),
  RPC_MAX_ATTEMPTS: Number(rawEnv.RPC_MAX_ATTEMPTS),
  RPC_BACKOFF_MS: Number(rawEnv.RPC_BACKOFF_MS),

  PANCAKESWAP_ROUTER_V2: rawEnv.PANCAKESWAP_ROUTER_V2,
  PANCAKESWAP_FACTORY_V2: rawEnv.PANCAKESWAP_FACTORY_V2,
  WBNB_ADDRESS: rawEnv.WBNB_ADDRESS,

  SIMULATION_SIZES_BNB: rawEnv.SIMULATION_SIZES_BNB.split(',').map((s) => s.trim()).filter(Boolean),
  TAX_BASELINE: rawEnv.TAX_BASELINE,
  AMM_FEE_BPS: Number(rawEnv.AMM_FEE_BPS),
  ANALYSIS_DEADLINE_MS: Number(rawEnv.ANALYSIS_DEADLINE_MS),

  BSCSCAN_API_URL: rawEnv.BSCSCAN_API_URL,
  BSCSCAN_API_KEY: rawEnv.BSCSCAN_API_KEY,

  METADATA_CACHE_TTL_SEC: Number(rawEnv.METADATA_CACHE_TTL_SEC),
  METADATA_CACHE_MAX: Number(rawEnv.METADATA_CACHE_MAX),

  SQLITE_PATH: rawEnv.SQLITE_PATH,

  LOG_LEVEL: rawEnv.LOG_LEVEL
};

export type Env = typeof env;
