/**
 * Cliente de línea de comandos para el Story Registry
 *
 * Uso:
 *   npm run story-cli -- mint "<título>" "<descripción>" <regalía%> [audioCid] [imageCid]
 *   npm run story-cli -- transfer <tokenId> <destinatario>
 *   npm run story-cli -- tip <tokenId> <monto>
 *   npm run story-cli -- show <tokenId>
 *   npm run story-cli -- balance [dirección]
 *
 * Requiere STORY_PRIVATE_KEY y API_URL en .env
 */

import axios, { AxiosInstance } from 'axios';
import dotenv from 'dotenv';
import { isHex } from 'viem';
import { privateKeyToAccount, PrivateKeyAccount } from 'viem/accounts';

dotenv.config();

const API_URL = process.env.API_URL || 'http://localhost:3001/api';
const EMPTY_CID = '0x';

function loadAccount(): PrivateKeyAccount {
  const privateKey = process.env.STORY_PRIVATE_KEY;
  if (!privateKey || !isHex(privateKey)) {
    throw new Error('STORY_PRIVATE_KEY no está configurado en .env (0x...)');
  }
  return privateKeyToAccount(privateKey);
}

/**
 * Firma el mensaje de login y devuelve un cliente HTTP con el JWT de sesión
 */
async function createSessionClient(account: PrivateKeyAccount): Promise<AxiosInstance> {
  const issuedAt = new Date().toISOString();
  const { data: challenge } = await axios.get(`${API_URL}/wallet/login-message/${account.address}`, {
    params: { issuedAt },
  });
  const signature = await account.signMessage({ message: challenge.message });

  const { data: session } = await axios.post(`${API_URL}/wallet/session`, {
    address: account.address,
    issuedAt,
    signature,
  });

  return axios.create({
    baseURL: API_URL,
    headers: { Authorization: `Bearer ${session.token}` },
  });
}

function requireArg(args: string[], index: number, name: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new Error(`Falta el argumento <${name}>`);
  }
  return value;
}

async function run(args: string[]): Promise<void> {
  const [command, ...rest] = args;
  const account = loadAccount();

  switch (command) {
    case 'mint': {
      const client = await createSessionClient(account);
      const { data } = await client.post('/stories', {
        title: requireArg(rest, 0, 'título'),
        description: requireArg(rest, 1, 'descripción'),
        royaltyPercent: Number(requireArg(rest, 2, 'regalía%')),
        audioCid: rest[3] ?? EMPTY_CID,
        imageCid: rest[4] ?? EMPTY_CID,
      });
      console.log(`✅ Historia minteada con token ID ${data.tokenId}`);
      break;
    }
    case 'transfer': {
      const client = await createSessionClient(account);
      const tokenId = requireArg(rest, 0, 'tokenId');
      const recipient = requireArg(rest, 1, 'destinatario');
      await client.post(`/stories/${tokenId}/transfer`, { sender: account.address, recipient });
      console.log(`✅ Token ${tokenId} transferido a ${recipient}`);
      break;
    }
    case 'tip': {
      const client = await createSessionClient(account);
      const tokenId = requireArg(rest, 0, 'tokenId');
      const amount = requireArg(rest, 1, 'monto');
      await client.post(`/stories/${tokenId}/tip`, { amount });
      console.log(`🎁 Propina de ${amount} enviada al creador del token ${tokenId}`);
      break;
    }
    case 'show': {
      const tokenId = requireArg(rest, 0, 'tokenId');
      const [{ data: details }, { data: owner }] = await Promise.all([
        axios.get(`${API_URL}/stories/${tokenId}`),
        axios.get(`${API_URL}/stories/${tokenId}/owner`),
      ]);
      if (!details.story) {
        console.log(`⚠️  La historia ${tokenId} no existe`);
        break;
      }
      console.log('📋 Historia:');
      console.log(JSON.stringify({ ...details.story, owner: owner.owner }, null, 2));
      break;
    }
    case 'balance': {
      const address = rest[0] ?? account.address;
      const { data } = await axios.get(`${API_URL}/balance/${address}`);
      console.log(`💰 Balance de ${address}: ${data.balance}`);
      break;
    }
    default:
      throw new Error(`Comando desconocido: ${command ?? '(vacío)'}. Usa mint, transfer, tip, show o balance`);
  }
}

run(process.argv.slice(2)).catch((error: unknown) => {
  if (axios.isAxiosError(error) && error.response) {
    console.error(`❌ Error ${error.response.status}:`, error.response.data);
  } else {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
