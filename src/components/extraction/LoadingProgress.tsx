type LoadingProgressProps = {
  percent: number;
  label: string;
};

const clampPercent = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(100, value));
};

export const LoadingProgress = ({ percent, label }: LoadingProgressProps) => {
  const rounded = Math.round(clampPercent(percent));

  return (
    <div className="w-full max-w-xl">
      <div className="mb-2 flex items-center justify-between gap-2 text-sm">
        <p style={{ color: "var(--color-text-secondary)" }}>{label}</p>
        <p className="font-semibold" style={{ color: "var(--color-text-primary)" }}>
          {rounded}%
        </p>
      </div>
      <div
        role="progressbar"
        aria-label={label}
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={rounded}
        className="h-2 w-full overflow-hidden rounded-full"
        style={{ background: "var(--color-bg-tertiary)" }}
      >
        <div
          className="h-full rounded-full transition-[width] duration-150 ease-out"
          style={{ width: `${rounded}%`, background: "var(--color-accent)" }}
        />
      </div>
    </div>
  );
};
