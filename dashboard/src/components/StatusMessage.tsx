interface Props {
  title: string;
  message: string;
  tone?: "error" | "info";
}

export function StatusMessage({ title, message, tone = "info" }: Props) {
  return (
    <div style={styles.box} role={tone === "error" ? "alert" : "status"}>
      <h2 style={{ ...styles.title, color: tone === "error" ? "#ef4444" : "#1e293b" }}>{title}</h2>
      <p style={styles.message}>{message}</p>
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  box: {
    background: "#fff",
    borderRadius: 8,
    padding: "32px 24px",
    boxShadow: "0 1px 3px rgba(0,0,0,0.08)",
    textAlign: "center",
  },
  title: { margin: 0, fontSize: 18, fontWeight: 600 },
  message: { margin: "8px 0 0", fontSize: 14, color: "#64748b" },
};
