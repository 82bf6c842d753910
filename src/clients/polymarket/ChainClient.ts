import { BigNumber, Contract, providers, utils } from 'ethers';
import type { IBalanceSource, IContractInspector } from '../shared/interfaces.js';
import { logger, type Logger } from '../../utils/logger.js';

const ERC20_ABI = [
  'function balanceOf(address owner) view returns (uint256)',
  'function decimals() view returns (uint8)',
];

export interface ChainClientConfig {
  rpcUrl: string;
  usdcContractAddress: string;
}

/**
 * Polygon RPC lookups: USDC balance, contract-type check and block height
 */
export class ChainClient implements IBalanceSource, IContractInspector {
  private provider: providers.JsonRpcProvider;
  private usdc: Contract;
  private decimals: number | null = null;
  private log: Logger;

  constructor(config: ChainClientConfig, provider?: providers.JsonRpcProvider) {
    this.provider = provider ?? new providers.JsonRpcProvider(config.rpcUrl);
    this.usdc = new Contract(config.usdcContractAddress, ERC20_ABI, this.provider);
    this.log = logger('ChainClient');
  }

  /**
   * USDC balance of an account; rejects on RPC failure
   */
  async getBalance(address: string): Promise<number> {
    const decimals = await this.getDecimals();
    const rawBalance: unknown = await this.usdc.balanceOf(address);

    if (!BigNumber.isBigNumber(rawBalance)) {
      throw new Error('balanceOf returned a non-numeric value');
    }
    return Number(utils.formatUnits(rawBalance, decimals));
  }

  /**
   * Whether the address holds contract code (a Safe proxy wallet) rather than being a plain key-controlled account
   */
  async isContract(address: string): Promise<boolean> {
    const code = await this.provider.getCode(address);
    const isContract = code !== '0x';
    this.log.debug('Checked account type', { isContract });
    return isContract;
  }

  async getBlockNumber(): Promise<number> {
    return this.provider.getBlockNumber();
  }

  private async getDecimals(): Promise<number> {
    if (this.decimals === null) {
      const decimals: unknown = await this.usdc.decimals();
      this.decimals = typeof decimals === 'number' ? decimals : 6;
    }
    return this.decimals;
  }
}
