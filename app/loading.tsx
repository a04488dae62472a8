import { Loader2 } from 'lucide-react';

export default function Loading() {
  return (
    <div role="status" aria-live="polite" className="flex min-h-[400px] items-center justify-center gap-3">
      <Loader2 className="h-6 w-6 animate-spin text-primary" />
      <span className="text-sm text-muted-foreground">Wird geladen…</span>
    </div>
  );
}
