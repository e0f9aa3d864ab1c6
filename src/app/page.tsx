import { ExtractionWorkspace } from "@/components/extraction/ExtractionWorkspace";

export default function Home() {
  return <ExtractionWorkspace />;
}
