"use client";

import maplibregl, {
  type Map,
  type MapLayerMouseEvent,
  type StyleSpecification,
} from "maplibre-gl";
import {
  forwardRef,
  useCallback,
  useEffect,
  useImperativeHandle,
  useRef,
} from "react";
import type { HospitalCollection } from "@/lib/types";

export type MapHandle = {
  /** Fly to a hospital by its id and visually select it. */
  flyToHospital: (hospitalId: string) => void;
  /** Show only these hospital ids (null = show all). */
  applyFilter: (hospitalIds: string[] | null) => void;
  /** Frame the given bounds. */
  fitTo: (bounds: [[number, number], [number, number]]) => void;
};

type Props = {
  geojson: HospitalCollection;
  onSelectHospital: (hospitalId: string | null) => void;
};

const SOURCE = "hospitals";
const LAYER = "hospitals-points";

// Centre of British Columbia
const BC_CENTER: [number, number] = [-123.5, 52.5];

function featureId(e: MapLayerMouseEvent): string | null {
  const raw: unknown = e.features?.[0]?.properties?.id;
  return typeof raw === "string" ? raw : null;
}

export const MapView = forwardRef<MapHandle, Props>(function MapView(
  { geojson, onSelectHospital },
  ref,
) {
  const mapRef = useRef<Map | null>(null);
  const containerRef = useRef<HTMLDivElement | null>(null);

  const hoveredIdRef = useRef<string | null>(null);
  const selectedIdRef = useRef<string | null>(null);

  // Track whether the source + layer have been added already
  const sourceAddedRef = useRef(false);

  // Keep latest onSelectHospital in a ref so the map callbacks don't go stale
  const onSelectRef = useRef(onSelectHospital);
  onSelectRef.current = onSelectHospital;

  const geojsonRef = useRef(geojson);
  geojsonRef.current = geojson;

  // Current id filter, applied once the layer exists
  const filterRef = useRef<string[] | null>(null);

  function setHover(map: Map, id: string | null) {
    if (hoveredIdRef.current !== null) {
      map.setFeatureState(
        { source: SOURCE, id: hoveredIdRef.current },
        { hover: false },
      );
    }
    hoveredIdRef.current = id;
    if (id !== null) {
      map.setFeatureState({ source: SOURCE, id }, { hover: true });
    }
  }

  const setSelected = useCallback((map: Map, id: string | null) => {
    if (selectedIdRef.current !== null) {
      map.setFeatureState(
        { source: SOURCE, id: selectedIdRef.current },
        { selected: false },
      );
    }
    selectedIdRef.current = id;
    if (id !== null) {
      map.setFeatureState({ source: SOURCE, id }, { selected: true });
    }
  }, []);

  const applyFilterToMap = useCallback((map: Map, ids: string[] | null) => {
    if (!map.getLayer(LAYER)) return;
    map.setFilter(LAYER, ids ? ["in", ["get", "id"], ["literal", ids]] : null);
  }, []);

  useImperativeHandle(
    ref,
    () => ({
      flyToHospital(hospitalId: string) {
        const map = mapRef.current;
        if (!map) return;

        const feature = geojsonRef.current.features.find(
          (f) => f.properties.id === hospitalId,
        );
        if (!feature) {
          // no coordinates, nothing to fly to
          setSelected(map, null);
          return;
        }

        setSelected(map, hospitalId);
        const [lng, lat] = feature.geometry.coordinates;
        map.flyTo({ center: [lng, lat], zoom: 12, duration: 1200 });
      },
      applyFilter(hospitalIds: string[] | null) {
        filterRef.current = hospitalIds;
        const map = mapRef.current;
        if (map) applyFilterToMap(map, hospitalIds);
      },
      fitTo(bounds: [[number, number], [number, number]]) {
        mapRef.current?.fitBounds(bounds, {
          padding: 60,
          maxZoom: 11,
          duration: 800,
        });
      },
    }),
    [setSelected, applyFilterToMap],
  );

  // ---- Initialise the map (once) ----
  useEffect(() => {
    if (!containerRef.current) return;
    if (mapRef.current) return;

    const style: StyleSpecification = {
      version: 8,
      sources: {
        osm: {
          type: "raster",
          tiles: ["https://tile.openstreetmap.org/{z}/{x}/{y}.png"],
          tileSize: 256,
          attribution:
            '© <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors',
        },
      },
      layers: [{ id: "osm", type: "raster", source: "osm" }],
    };

    const map = new maplibregl.Map({
      container: containerRef.current,
      style,
      center: BC_CENTER,
      zoom: 4.5,
      maxZoom: 18,
    });

    map.addControl(new maplibregl.NavigationControl(), "top-left");

    mapRef.current = map;

    return () => {
      map.remove();
      mapRef.current = null;
      sourceAddedRef.current = false;
    };
  }, []);

  // ---- Add the GeoJSON source and marker layer ----
  useEffect(() => {
    const map = mapRef.current;
    if (!map) return;

    function addSourceAndLayer(target: Map) {
      if (sourceAddedRef.current) return;

      target.addSource(SOURCE, {
        type: "geojson",
        data: geojsonRef.current,
        promoteId: "id",
      });

      target.addLayer({
        id: LAYER,
        type: "circle",
        source: SOURCE,
        paint: {
          "circle-radius": [
            "case",
            ["boolean", ["feature-state", "selected"], false],
            10,
            ["boolean", ["feature-state", "hover"], false],
            8,
            6,
          ],
          // red: 200+ beds, orange: 100-199, green: <100, gray: unknown
          "circle-color": [
            "match",
            ["get", "bedClass"],
            "large",
            "#dc2626",
            "medium",
            "#f59e0b",
            "small",
            "#16a34a",
            "#9ca3af",
          ],
          "circle-opacity": 0.85,
          "circle-stroke-width": [
            "case",
            ["boolean", ["feature-state", "selected"], false],
            3,
            ["boolean", ["feature-state", "hover"], false],
            2,
            1.5,
          ],
          "circle-stroke-color": "#1e3a8a",
        },
      });

      target.on("mousemove", LAYER, (e) => {
        const id = featureId(e);
        if (id == null) return;
        target.getCanvas().style.cursor = "pointer";
        setHover(target, id);
      });

      target.on("mouseleave", LAYER, () => {
        target.getCanvas().style.cursor = "";
        setHover(target, null);
      });

      target.on("click", LAYER, (e) => {
        const id = featureId(e);
        setSelected(target, id);
        onSelectRef.current(id);
      });

      // Click empty space clears selection
      target.on("click", (e) => {
        const features = target.queryRenderedFeatures(e.point, {
          layers: [LAYER],
        });
        if (features.length === 0) {
          setSelected(target, null);
          onSelectRef.current(null);
        }
      });

      sourceAddedRef.current = true;

      if (filterRef.current !== null) {
        applyFilterToMap(target, filterRef.current);
      }
    }

    // Map may or may not have finished loading yet
    if (map.isStyleLoaded()) {
      addSourceAndLayer(map);
    } else {
      map.once("load", () => addSourceAndLayer(map));
    }
  }, [setSelected, applyFilterToMap]);

  return <div ref={containerRef} className="h-full w-full" />;
});
