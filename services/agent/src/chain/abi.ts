import { Interface } from "ethers";

export const UNISWAP_V2_ROUTER_ABI = [
  "function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)",
  "function swapExactTokensForTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)",
] as const;

export const UNISWAP_V2_PAIR_ABI = [
  "function swap(uint256 amount0Out, uint256 amount1Out, address to, bytes data)",
  "function token0() view returns (address)",
] as const;

export const ERC20_ABI = [
  "function approve(address spender, uint256 amount) returns (bool)",
  "function transfer(address to, uint256 amount) returns (bool)",
] as const;

export const MULTISEND_ABI = ["function multiSend(bytes transactions) payable"] as const;

export const GNOSIS_SAFE_ABI = [
  "function nonce() view returns (uint256)",
] as const;

export const routerIface = new Interface([...UNISWAP_V2_ROUTER_ABI]);
export const pairIface = new Interface([...UNISWAP_V2_PAIR_ABI]);
export const erc20Iface = new Interface([...ERC20_ABI]);
export const multisendIface = new Interface([...MULTISEND_ABI]);
export const safeIface = new Interface([...GNOSIS_SAFE_ABI]);
