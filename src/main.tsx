import React from "react";
import ReactDOM from "react-dom/client";
import { RegionCaptureOverlay } from "./features/system/region-capture/overlay/RegionCaptureOverlay";
import "./styles.css";

const container = document.getElementById("root");
if (!container) {
  throw new Error("Missing #root element.");
}

document.body.classList.add("region-capture-overlay");

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <RegionCaptureOverlay />
  </React.StrictMode>
);
