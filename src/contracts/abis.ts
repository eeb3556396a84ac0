import { parseAbi, parseAbiItem, toEventSelector } from 'viem';

// ERC20 surface used for probing and transfers
export const ERC20_ABI = parseAbi([
  'function balanceOf(address account) view returns (uint256)',
  'function decimals() view returns (uint8)',
  'function symbol() view returns (string)',
  'function name() view returns (string)',
  'function transfer(address to, uint256 amount) returns (bool)',
]);

// ERC721 surface; balanceOf shares its selector with ERC20
export const ERC721_ABI = parseAbi([
  'function balanceOf(address owner) view returns (uint256)',
  'function symbol() view returns (string)',
  'function name() view returns (string)',
  'function tokenOfOwnerByIndex(address owner, uint256 index) view returns (uint256)',
  'function safeTransferFrom(address from, address to, uint256 tokenId)',
]);

/**
 * ERC-20 and ERC-721 share this event signature; ERC-721 indexes the
 * third argument as well
 */
export const TRANSFER_EVENT = parseAbiItem(
  'event Transfer(address indexed from, address indexed to, uint256 value)'
);

/** keccak256('Transfer(address,address,uint256)') */
export const TRANSFER_TOPIC = toEventSelector(TRANSFER_EVENT);
