import { useState } from 'react';
import { Check, Copy } from 'lucide-react';

export function CouponCode({ code }: { code: string }) {
  const [copied, setCopied] = useState(false);

  const handleCopy = async () => {
    try {
      await navigator.clipboard.writeText(code);
      setCopied(true);
    } catch (err) {
      // clipboard needs a secure context; the code is still on screen
      console.warn('Could not copy coupon code', err);
    }
  };

  return (
    <div className="inline-flex items-center gap-3 mt-4 px-3 py-2 border border-dashed border-accent rounded-xl">
      <span className="text-sm text-[var(--text-subtle)]">Coupon</span>
      <code className="text-lg font-bold tracking-wider">{code}</code>
      <button
        type="button"
        className="inline-flex text-inherit hover:text-accent transition"
        onClick={() => void handleCopy()}
        aria-label="Copy coupon code"
      >
        {copied ? <Check size={16} /> : <Copy size={16} />}
      </button>
    </div>
  );
}
