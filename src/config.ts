import { z } from 'zod';
import { isAddress } from './kernel-core/L1/Identity.js';
import { ValidationError } from './Platform/Errors.js';

const AddressSchema = z.string().refine(isAddress, 'must be a 0x-prefixed 20-byte hex address').transform(v => v.toLowerCase());
const PublicKeySchema = z.string().regex(/^[0-9a-fA-F]{64}$/, 'must be a 32-byte hex ed25519 key');

const PrincipalSchema = z.string().transform((entry, ctx) => {
    const [address = '', publicKey = ''] = entry.split(':');
    const parsed = z.object({ address: AddressSchema, publicKey: PublicKeySchema }).safeParse({ address, publicKey });
    if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad principal "${entry}"` });
        return z.NEVER;
    }
    return parsed.data;
});

export const ConfigSchema = z.object({
    LOCKUP_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    LOCKUP_DB_PATH: z.string().min(1).default('lockup.db'),
    LOCKUP_TOKEN_ADDRESS: AddressSchema.default('0x00000000000000000000000000000000000000a1'),
    LOCKUP_KERNEL_ADDRESS: AddressSchema.default('0x00000000000000000000000000000000000000b1'),
    LOCKUP_OWNER_ADDRESS: AddressSchema.default('0x0000000000000000000000000000000000000001'),
    LOCKUP_INITIAL_SUPPLY: z.string().regex(/^\d+$/, 'must be a decimal integer').default('1000000000000000000000000').transform(v => BigInt(v)),
    // "address:publicKey" pairs, comma separated
    LOCKUP_PRINCIPALS: z.string().default('').transform(v => v.split(',').map(s => s.trim()).filter(s => s.length > 0))
        .pipe(z.array(PrincipalSchema))
});

export type LockupConfig = z.output<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LockupConfig {
    const result = ConfigSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationError('Invalid configuration', issues, 'INVALID_CONFIG');
    }
    return result.data;
}
